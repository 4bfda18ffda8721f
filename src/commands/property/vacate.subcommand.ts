import { Declare, Options, SubCommand, createStringOption, type GuildCommandContext } from "seyfert";
import { getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  property: createStringOption({
    description: "Property id",
    required: true,
  }),
};

@Declare({
  name: "vacate",
  description: "Move out of a house or give up a vehicle",
})
@Options(options)
export default class PropertyVacateSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().vacate(resolveActor(ctx), ctx.options.property);
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(ctx, `📦 **${result.unwrap().label}** is vacant.`);
  }
}
