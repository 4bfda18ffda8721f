export * from "./definitions";
export * from "./types";
export { BusinessServiceImpl, type BusinessService } from "./service";
