import { Declare, Options, SubCommand, createStringOption, type GuildCommandContext } from "seyfert";
import { BUSINESS_TYPES, getWorldEngine, listBusinessTypes } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  name: createStringOption({
    description: "Business name",
    required: true,
    max_length: 64,
  }),
  type: createStringOption({
    description: "Kind of business",
    required: true,
    choices: listBusinessTypes().map((type) => ({ name: BUSINESS_TYPES[type].label, value: type })),
  }),
};

@Declare({
  name: "found",
  description: "Found a business",
})
@Options(options)
export default class BusinessFoundSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().createBusiness(resolveActor(ctx), {
      name: ctx.options.name,
      type: ctx.options.type,
      founderId: ctx.author.id,
    });
    if (result.isErr()) return replyError(ctx, result.error);

    const business = result.unwrap();
    await replyOk(ctx, `🏪 **${business.name}** is open for business. Id: \`${business._id}\`.`);
  }
}
