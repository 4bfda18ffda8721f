/**
 * World Audit Trail.
 *
 * Purpose: one entry per committed mutation, staged into the same batch as
 * the change so the trail never disagrees with the data.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { AuditEntry } from "@/db/schemas";
import type { WriteBatch } from "../storage";
import { query, type WorldContext } from "../context";
import { generateId } from "../ids";
import type { WorldError } from "../errors";

export interface AuditInput {
  readonly operation: string;
  readonly actorId: string;
  readonly targetId: string;
  readonly amount?: number;
  readonly metadata?: Record<string, unknown>;
}

export function stageAudit(ctx: WorldContext, batch: WriteBatch, input: AuditInput): AuditEntry {
  const timestamp = ctx.clock.now();
  const entry: AuditEntry = {
    _id: generateId("aud", timestamp),
    operation: input.operation,
    actorId: input.actorId,
    targetId: input.targetId,
    timestamp,
    amount: input.amount ?? null,
    ...(input.metadata ? { metadata: input.metadata } : {}),
  };
  batch.put("audit", entry);
  return entry;
}

export const DEFAULT_AUDIT_LIMIT = 20;
export const MAX_AUDIT_LIMIT = 100;

/** Latest entries first. */
export async function auditTrail(
  ctx: WorldContext,
  targetId: string,
  limit: number = DEFAULT_AUDIT_LIMIT,
): Promise<Result<AuditEntry[], WorldError>> {
  const bounded = Math.min(Math.max(1, Math.trunc(limit)), MAX_AUDIT_LIMIT);
  const res = await query(ctx, "audit", {
    where: { targetId },
    sort: { field: "timestamp", direction: "desc" },
    limit: bounded,
  });
  if (res.isErr()) return ErrResult(res.error);
  return OkResult(res.unwrap());
}
