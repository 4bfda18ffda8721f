import { Declare, Options, SubCommand, createUserOption, type GuildCommandContext } from "seyfert";
import { getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  user: createUserOption({
    description: "Citizen to archive",
    required: true,
  }),
};

@Declare({
  name: "archive",
  description: "Archive a citizen and release their holdings (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class RpAdminArchiveSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { user } = ctx.options;
    const result = await getWorldEngine().archive(resolveActor(ctx), user.id);
    if (result.isErr()) return replyError(ctx, result.error);

    const receipt = result.unwrap();
    await replyOk(
      ctx,
      `🗄️ ${user.toString()} archived. Released ${receipt.releasedBusinesses.length} business(es) and ${receipt.releasedProperties.length} propert(ies).`,
    );
  }
}
