import { Declare, Options, SubCommand, createUserOption, type GuildCommandContext } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

const options = {
  owner: createUserOption({
    description: "Only show this citizen's businesses",
    required: false,
  }),
};

@Declare({
  name: "list",
  description: "List businesses in the city",
})
@Options(options)
export default class BusinessListSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().listBusinesses(resolveActor(ctx), ctx.options.owner?.id);
    if (result.isErr()) return replyError(ctx, result.error);

    const lines = result
      .unwrap()
      .slice(0, 25)
      .map(
        (b) =>
          `**${b.name}** · ${b.type} · ${b.ownerId ? `<@${b.ownerId}>` : "unowned"} · ${formatMoney(b.revenue)} (\`${b._id}\`)`,
      );

    await ctx.write({
      embeds: [
        {
          color: EmbedColors.Blue,
          title: "🏪 Businesses",
          description: lines.join("\n") || "No businesses yet.",
        },
      ],
    });
  }
}
