/**
 * Shared helpers for the world chat commands (`/rp`, `/business`, `/property`, `/law`, `/rp-admin`).
 *
 * Purpose: derive the engine `Actor` from the invoking member and turn engine
 * results into replies.
 * Invariants: authority is decided only here, from the configured Discord
 * permissions; the engine trusts the capability it receives.
 */
import type { GuildCommandContext } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import type { PermissionsBitField } from "seyfert/lib/structures/extra/Permissions";
import { MessageFlags } from "seyfert/lib/types";
import type { AuthorityPermission } from "@/configuration";
import { describeWorldError, getWorldEngine, type Actor, type WorldError } from "@/modules/world";

/**
 * True when the member holds at least one of `wanted`. Each permission is
 * checked on its own: `has` with a list requires all of them.
 */
export function holdsAnyPermission(
  permissions: PermissionsBitField | undefined,
  wanted: readonly AuthorityPermission[],
): boolean {
  if (!permissions) return false;
  return wanted.some((permission) => permissions.has([permission]));
}

export function resolveActor(ctx: GuildCommandContext): Actor {
  const wanted = getWorldEngine().ctx.config.identity.authorityPermissions;
  const authority = holdsAnyPermission(ctx.member?.permissions, wanted);
  return { id: ctx.author.id, capability: authority ? "authority" : "citizen" };
}

export async function replyError(ctx: GuildCommandContext, error: WorldError): Promise<void> {
  await ctx.write({
    embeds: [{ color: EmbedColors.Red, description: `❌ ${describeWorldError(error)}` }],
    flags: MessageFlags.Ephemeral,
  });
}

export async function replyOk(ctx: GuildCommandContext, description: string): Promise<void> {
  await ctx.write({
    embeds: [{ color: EmbedColors.Green, description }],
  });
}
