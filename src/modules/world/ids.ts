import { randomBytes } from "node:crypto";

/**
 * Generates a sortable, prefixed id (`fine_lx3k9q_4f1a2b3c`).
 * The time component keeps ids roughly ordered for listings.
 */
export function generateId(prefix: string, at: Date = new Date()): string {
  return `${prefix}_${at.getTime().toString(36)}_${randomBytes(4).toString("hex")}`;
}
