import type { CitizenId } from "@/db/types";
import type { JobKind } from "./definitions";

export interface EarnReceipt {
  readonly citizenId: CitizenId;
  readonly job: JobKind;
  readonly payout: number;
  readonly balance: number;
  /** First moment the next `earn` succeeds. */
  readonly nextEarnAt: Date;
}
