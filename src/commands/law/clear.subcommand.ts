import { Declare, Options, SubCommand, createUserOption, type GuildCommandContext } from "seyfert";
import { getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  user: createUserOption({
    description: "Citizen to clear",
    required: true,
  }),
};

@Declare({
  name: "clear",
  description: "Clear a wanted notice (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class LawUnwantedSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { user } = ctx.options;
    const result = await getWorldEngine().clearWanted(resolveActor(ctx), user.id);
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(ctx, `✅ ${user.toString()} is no longer wanted.`);
  }
}
