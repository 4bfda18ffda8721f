import { Declare, Options, SubCommand, createStringOption, type GuildCommandContext } from "seyfert";
import { getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  fine: createStringOption({
    description: "Fine id",
    required: true,
  }),
};

@Declare({
  name: "waive",
  description: "Waive a fine (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class LawWaiveFineSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().waiveFine(resolveActor(ctx), ctx.options.fine);
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(ctx, `🕊️ Fine \`${result.unwrap()._id}\` waived.`);
  }
}
