import { Declare, SubCommand, type GuildCommandContext } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

@Declare({
  name: "stats",
  description: "City-wide figures",
})
export default class RpStatsSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const result = await getWorldEngine().stats(resolveActor(ctx));
    if (result.isErr()) return replyError(ctx, result.error);
    const stats = result.unwrap();

    await ctx.write({
      embeds: [
        {
          color: EmbedColors.Blue,
          title: "📊 City statistics",
          fields: [
            {
              name: "Citizens",
              value: `${stats.citizens.active} active · ${stats.citizens.archived} archived`,
            },
            {
              name: "Businesses",
              value: `${stats.businesses.owned} owned · ${stats.businesses.unowned} unowned`,
            },
            {
              name: "Property",
              value: `${stats.properties.houses} houses · ${stats.properties.vehicles} vehicles\n${stats.properties.vacant} vacant · ${stats.properties.owned} owned · ${stats.properties.rented} rented`,
            },
            {
              name: "Law",
              value: `${stats.activeWanted} wanted · ${stats.unpaidFines.count} unpaid fines (${formatMoney(stats.unpaidFines.total)})`,
            },
            { name: "Money in circulation", value: formatMoney(stats.moneyInCirculation) },
          ],
        },
      ],
    });
  }
}
