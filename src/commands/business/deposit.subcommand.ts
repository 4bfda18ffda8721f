import {
  Declare,
  Options,
  SubCommand,
  createIntegerOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  business: createStringOption({
    description: "Business id",
    required: true,
  }),
  amount: createIntegerOption({
    description: "Revenue earned",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "deposit",
  description: "Book revenue earned by your business",
})
@Options(options)
export default class BusinessDepositSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { business, amount } = ctx.options;
    const result = await getWorldEngine().depositRevenue(resolveActor(ctx), business, amount);
    if (result.isErr()) return replyError(ctx, result.error);

    const updated = result.unwrap();
    await replyOk(ctx, `📈 **${updated.name}** revenue is now ${formatMoney(updated.revenue)}.`);
  }
}
