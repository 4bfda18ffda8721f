import {
  Declare,
  Options,
  SubCommand,
  createIntegerOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { getWorldEngine, relativeTime } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  property: createStringOption({
    description: "Property id",
    required: true,
  }),
  days: createIntegerOption({
    description: "Rental period in days",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "rent",
  description: "Rent a vacant house or vehicle",
})
@Options(options)
export default class PropertyRentSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { property, days } = ctx.options;
    const result = await getWorldEngine().rent(resolveActor(ctx), property, ctx.author.id, days);
    if (result.isErr()) return replyError(ctx, result.error);

    const rented = result.unwrap();
    const until = rented.rentedUntil ? ` until ${relativeTime(rented.rentedUntil)}` : "";
    await replyOk(ctx, `🗝️ You are renting **${rented.label}**${until}.`);
  }
}
