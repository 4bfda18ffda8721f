export * from "./types";
export { CitizenServiceImpl, type CitizenService } from "./service";
