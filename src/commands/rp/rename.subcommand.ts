import { Declare, Options, SubCommand, createStringOption, type GuildCommandContext } from "seyfert";
import { getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  name: createStringOption({
    description: "New character name",
    required: true,
    max_length: 32,
  }),
};

@Declare({
  name: "rename",
  description: "Change your character's name",
})
@Options(options)
export default class RpRenameSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().rename(resolveActor(ctx), ctx.author.id, ctx.options.name);
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(ctx, `✏️ You are now known as **${result.unwrap().displayName}**.`);
  }
}
