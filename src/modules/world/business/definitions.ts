/** Business types a citizen can found. */
export const BUSINESS_TYPES = {
  shop: { label: "Shop" },
  restaurant: { label: "Restaurant" },
  garage: { label: "Garage" },
  club: { label: "Club" },
  office: { label: "Office" },
  farm: { label: "Farm" },
} as const;

export type BusinessType = keyof typeof BUSINESS_TYPES;

export const isBusinessType = (value: string): value is BusinessType =>
  Object.hasOwn(BUSINESS_TYPES, value);

export const listBusinessTypes = (): BusinessType[] =>
  Object.keys(BUSINESS_TYPES).filter(isBusinessType);
