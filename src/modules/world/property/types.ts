import type { PropertyKind, PropertyStatus } from "@/db/schemas";

export interface CreatePropertyInput {
  readonly kind: PropertyKind;
  readonly label: string;
  readonly price: number;
  /** Per day; 0 makes renting free. */
  readonly rentPrice: number;
  /** Houses only. */
  readonly district?: string | null;
}

export interface PropertyFilter {
  readonly kind?: PropertyKind;
  readonly district?: string;
  readonly status?: PropertyStatus;
  readonly occupantId?: string;
}
