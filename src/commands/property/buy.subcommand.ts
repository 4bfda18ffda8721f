import { Declare, Options, SubCommand, createStringOption, type GuildCommandContext } from "seyfert";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  property: createStringOption({
    description: "Property id",
    required: true,
  }),
};

@Declare({
  name: "buy",
  description: "Buy a vacant house or vehicle",
})
@Options(options)
export default class PropertyBuySubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().purchase(resolveActor(ctx), ctx.options.property, ctx.author.id);
    if (result.isErr()) return replyError(ctx, result.error);

    const property = result.unwrap();
    await replyOk(ctx, `🔑 You bought **${property.label}** for ${formatMoney(property.price)}.`);
  }
}
