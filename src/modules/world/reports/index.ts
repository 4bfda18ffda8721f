export * from "./types";
export { ReportServiceImpl, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, type ReportService } from "./service";
