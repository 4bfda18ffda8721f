import type { CitizenId } from "@/db/types";

export interface CreateBusinessInput {
  readonly name: string;
  readonly type: string;
  readonly founderId: CitizenId;
}

export interface WithdrawalReceipt {
  readonly businessId: string;
  readonly toCitizenId: CitizenId;
  readonly amount: number;
  readonly revenue: number;
  readonly balance: number;
}
