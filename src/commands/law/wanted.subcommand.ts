import {
  Declare,
  Options,
  SubCommand,
  createStringOption,
  createUserOption,
  type GuildCommandContext,
} from "seyfert";
import { getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  user: createUserOption({
    description: "Citizen to flag",
    required: true,
  }),
  reason: createStringOption({
    description: "What they are wanted for",
    required: true,
    max_length: 200,
  }),
};

@Declare({
  name: "wanted",
  description: "Issue a wanted notice (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class LawWantedSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { user, reason } = ctx.options;
    const result = await getWorldEngine().issueWanted(resolveActor(ctx), user.id, reason);
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(ctx, `🚨 ${user.toString()} is now wanted: ${result.unwrap().reason}`);
  }
}
