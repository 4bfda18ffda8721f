import {
  Declare,
  Options,
  SubCommand,
  createIntegerOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  name: createStringOption({
    description: "Your character's name",
    required: true,
    max_length: 32,
  }),
  age: createIntegerOption({
    description: "Your character's age",
    required: true,
    min_value: 1,
  }),
};

@Declare({
  name: "register",
  description: "Become a citizen of the city",
})
@Options(options)
export default class RpRegisterSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const actor = resolveActor(ctx);
    const result = await getWorldEngine().register(actor, {
      citizenId: ctx.author.id,
      displayName: ctx.options.name,
      age: ctx.options.age,
    });
    if (result.isErr()) return replyError(ctx, result.error);

    const citizen = result.unwrap();
    await replyOk(
      ctx,
      `🪪 Welcome to the city, **${citizen.displayName}** (${citizen.age}). Balance: ${formatMoney(0)}. Use \`/rp jobs\` to find work.`,
    );
  }
}
