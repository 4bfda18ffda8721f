import {
  Declare,
  Options,
  SubCommand,
  createIntegerOption,
  createStringOption,
  type GuildCommandContext,
} from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { PropertyKindSchema } from "@/db/schemas";
import { getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  kind: createStringOption({
    description: "House or vehicle",
    required: true,
    choices: [
      { name: "House", value: "house" },
      { name: "Vehicle", value: "vehicle" },
    ],
  }),
  label: createStringOption({
    description: "Listing name",
    required: true,
    max_length: 64,
  }),
  price: createIntegerOption({
    description: "Purchase price",
    required: true,
    min_value: 0,
  }),
  rent: createIntegerOption({
    description: "Rent per day (0 for free)",
    required: true,
    min_value: 0,
  }),
  district: createStringOption({
    description: "District (houses only)",
    required: false,
  }),
};

@Declare({
  name: "create",
  description: "List a new house or vehicle (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class PropertyCreateSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const kind = PropertyKindSchema.safeParse(ctx.options.kind);
    if (!kind.success) {
      await ctx.write({ content: "Kind must be `house` or `vehicle`.", flags: MessageFlags.Ephemeral });
      return;
    }
    const result = await getWorldEngine().createProperty(resolveActor(ctx), {
      kind: kind.data,
      label: ctx.options.label,
      price: ctx.options.price,
      rentPrice: ctx.options.rent,
      district: ctx.options.district,
    });
    if (result.isErr()) return replyError(ctx, result.error);
    await replyOk(ctx, `🏗️ Listed **${result.unwrap().label}** as \`${result.unwrap()._id}\`.`);
  }
}
