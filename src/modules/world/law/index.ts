export {
  DEFAULT_LAW_LIST_LIMIT,
  LawServiceImpl,
  MAX_LAW_LIST_LIMIT,
  type FineListFilter,
  type LawService,
  type WantedListFilter,
} from "./service";
