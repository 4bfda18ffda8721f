export * from "./definitions";
export * from "./types";
export { EmploymentServiceImpl, type EmploymentService } from "./service";
