import {
  Declare,
  Options,
  SubCommand,
  createBooleanOption,
  type GuildCommandContext,
} from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

const options = {
  unpaid: createBooleanOption({
    description: "Only unpaid fines",
    required: false,
  }),
};

@Declare({
  name: "finebook",
  description: "List fines across every citizen (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class LawFinebookSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().listAllFines(resolveActor(ctx), {
      unpaidOnly: ctx.options.unpaid ?? false,
      limit: 20,
    });
    if (result.isErr()) return replyError(ctx, result.error);

    const lines = result
      .unwrap()
      .map((f) => `\`${f._id}\` · <@${f.citizenId}> · ${formatMoney(f.amount)} · ${f.status} · ${f.reason}`);

    await ctx.write({
      embeds: [
        {
          color: EmbedColors.Orange,
          title: "🧾 Fine book",
          description: lines.join("\n") || "No fines.",
        },
      ],
    });
  }
}
