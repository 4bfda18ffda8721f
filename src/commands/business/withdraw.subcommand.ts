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
    description: "Amount to take out",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "withdraw",
  description: "Move business revenue into your account",
})
@Options(options)
export default class BusinessWithdrawSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { business, amount } = ctx.options;
    const result = await getWorldEngine().withdrawRevenue(
      resolveActor(ctx),
      business,
      amount,
      ctx.author.id,
    );
    if (result.isErr()) return replyError(ctx, result.error);

    const receipt = result.unwrap();
    await replyOk(
      ctx,
      `🏦 Withdrew ${formatMoney(receipt.amount)}. Revenue left: ${formatMoney(receipt.revenue)}. Your balance: ${formatMoney(receipt.balance)}.`,
    );
  }
}
