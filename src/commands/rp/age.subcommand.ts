import { Declare, Options, SubCommand, createIntegerOption, type GuildCommandContext } from "seyfert";
import { getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  age: createIntegerOption({
    description: "Your character's age",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "age",
  description: "Change your character's age",
})
@Options(options)
export default class RpAgeSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().setAge(resolveActor(ctx), ctx.author.id, ctx.options.age);
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(ctx, `🎂 Your character is now ${result.unwrap().age}.`);
  }
}
