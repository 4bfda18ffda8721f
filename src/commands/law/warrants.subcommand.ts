import {
  Declare,
  Options,
  SubCommand,
  createBooleanOption,
  type GuildCommandContext,
} from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { getWorldEngine, relativeTime } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

const options = {
  all: createBooleanOption({
    description: "Include cleared notices",
    required: false,
  }),
};

@Declare({
  name: "warrants",
  description: "List wanted notices across the world (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class LawWarrantsSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const activeOnly = !(ctx.options.all ?? false);
    const result = await getWorldEngine().listWanted(resolveActor(ctx), { activeOnly, limit: 20 });
    if (result.isErr()) return replyError(ctx, result.error);

    const lines = result
      .unwrap()
      .map((w) => `<@${w.citizenId}> · ${w.status} · ${w.reason} · ${relativeTime(w.issuedAt)}`);

    await ctx.write({
      embeds: [
        {
          color: EmbedColors.Red,
          title: activeOnly ? "🚨 Active wanted notices" : "🚨 Wanted notices",
          description: lines.join("\n") || "Nobody is wanted.",
        },
      ],
    });
  }
}
