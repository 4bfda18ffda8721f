import {
  Declare,
  Options,
  SubCommand,
  createBooleanOption,
  createUserOption,
  type GuildCommandContext,
} from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

const options = {
  user: createUserOption({
    description: "Citizen (defaults to you)",
    required: false,
  }),
  unpaid: createBooleanOption({
    description: "Only unpaid fines",
    required: false,
  }),
};

@Declare({
  name: "fines",
  description: "List a citizen's fines",
})
@Options(options)
export default class LawFinesSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const target = ctx.options.user ?? ctx.author;
    const result = await getWorldEngine().listFines(resolveActor(ctx), target.id, ctx.options.unpaid ?? false);
    if (result.isErr()) return replyError(ctx, result.error);

    const lines = result
      .unwrap()
      .slice(0, 20)
      .map((f) => `\`${f._id}\` · ${formatMoney(f.amount)} · ${f.status} · ${f.reason}`);

    await ctx.write({
      embeds: [
        {
          color: EmbedColors.Orange,
          title: `🧾 Fines for ${target.username}`,
          description: lines.join("\n") || "No fines.",
        },
      ],
    });
  }
}
