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
    description: "Citizen to debit",
    required: true,
  }),
  amount: createIntegerOption({
    description: "Amount to remove",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "take",
  description: "Remove money from a citizen's account (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class RpAdminTakeSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { user, amount } = ctx.options;
    const result = await getWorldEngine().debit(resolveActor(ctx), user.id, amount);
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(
      ctx,
      `➖ ${formatMoney(amount)} removed from ${user.toString()}. Balance: ${formatMoney(result.unwrap().balanceAfter)}.`,
    );
  }
}
