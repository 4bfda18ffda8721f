import {
  Declare,
  Options,
  SubCommand,
  createIntegerOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { getWorldEngine } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

const options = {
  query: createStringOption({
    description: "Part of a name or account id",
    required: false,
  }),
  page: createIntegerOption({
    description: "Page number",
    required: false,
    min_value: 1,
  }),
};

@Declare({
  name: "search",
  description: "Search the citizen registry",
})
@Options(options)
export default class RpSearchSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().searchCitizens(resolveActor(ctx), {
      query: ctx.options.query,
      page: ctx.options.page ?? 1,
    });
    if (result.isErr()) return replyError(ctx, result.error);

    const page = result.unwrap();
    await ctx.write({
      embeds: [
        {
          color: EmbedColors.Blue,
          title: `🔎 Citizens (${page.total})`,
          description:
            page.items
              .map((c) => `**${c.displayName}** · <@${c._id}>${c.status === "archived" ? " · archived" : ""}`)
              .join("\n") || "No citizens found.",
          footer: { text: `Page ${page.page}/${page.totalPages}` },
        },
      ],
    });
  }
}
