import { Declare, SubCommand, type GuildCommandContext } from "seyfert";
import { formatMoney, getJobDefinition, getWorldEngine, relativeTime } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

@Declare({
  name: "work",
  description: "Work a shift at your current job",
})
export default class RpWorkSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const result = await getWorldEngine().earn(resolveActor(ctx), ctx.author.id);
    if (result.isErr()) return replyError(ctx, result.error);

    const receipt = result.unwrap();
    const label = getJobDefinition(receipt.job)?.label ?? receipt.job;
    await replyOk(
      ctx,
      `🛠️ Shift done as **${label}**: +${formatMoney(receipt.payout)}. Balance: ${formatMoney(receipt.balance)}. Next shift ${relativeTime(receipt.nextEarnAt)}.`,
    );
  }
}
