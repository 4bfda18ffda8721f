import {
  Declare,
  Options,
  SubCommand,
  createIntegerOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { getWorldEngine } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

const options = {
  target: createStringOption({
    description: "Citizen, business, property or fine id",
    required: true,
  }),
  limit: createIntegerOption({
    description: "How many entries",
    required: false,
    min_value: 1,
    max_value: 100,
  }),
};

@Declare({
  name: "audit",
  description: "Recent changes to a record (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class RpAdminAuditSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().auditTrail(resolveActor(ctx), ctx.options.target, ctx.options.limit);
    if (result.isErr()) return replyError(ctx, result.error);

    const lines = result
      .unwrap()
      .map(
        (e) =>
          `\`${e.timestamp.toISOString()}\` ${e.operation} by <@${e.actorId}>${e.amount !== null ? ` (${e.amount})` : ""}`,
      );

    await ctx.write({
      content: lines.join("\n") || "No audit entries.",
      flags: MessageFlags.Ephemeral,
    });
  }
}
