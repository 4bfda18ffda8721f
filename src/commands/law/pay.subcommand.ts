import { Declare, Options, SubCommand, createStringOption, type GuildCommandContext } from "seyfert";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  fine: createStringOption({
    description: "Fine id",
    required: true,
  }),
};

@Declare({
  name: "pay",
  description: "Pay one of your fines",
})
@Options(options)
export default class LawPayFineSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().payFine(resolveActor(ctx), ctx.options.fine, ctx.author.id);
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(ctx, `✅ Paid ${formatMoney(result.unwrap().amount)}. The fine is settled.`);
  }
}
