export * from "./types";
export { LedgerServiceImpl, stageCredit, stageDebit, type LedgerService } from "./service";
