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
  business: createStringOption({
    description: "Business id",
    required: true,
  }),
  user: createUserOption({
    description: "New owner",
    required: true,
  }),
};

@Declare({
  name: "transfer",
  description: "Hand a business over to another citizen",
})
@Options(options)
export default class BusinessTransferSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { business, user } = ctx.options;
    const result = await getWorldEngine().transferBusiness(resolveActor(ctx), business, user.id);
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(ctx, `🤝 **${result.unwrap().name}** now belongs to ${user.toString()}.`);
  }
}
