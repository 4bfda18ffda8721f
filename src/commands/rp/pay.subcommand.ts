import {
  Declare,
  Options,
  SubCommand,
  createIntegerOption,
  createUserOption,
  type GuildCommandContext,
} from "seyfert";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  user: createUserOption({
    description: "Citizen to pay",
    required: true,
  }),
  amount: createIntegerOption({
    description: "Amount to send",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "pay",
  description: "Send money to another citizen",
})
@Options(options)
export default class RpPaySubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { user, amount } = ctx.options;
    const result = await getWorldEngine().transfer(resolveActor(ctx), ctx.author.id, user.id, amount);
    if (result.isErr()) return replyError(ctx, result.error);

    await replyOk(
      ctx,
      `💸 Sent ${formatMoney(amount)} to ${user.toString()}. Your balance: ${formatMoney(result.unwrap().fromBalance)}.`,
    );
  }
}
