import { Declare, Options, SubCommand, createStringOption, type GuildCommandContext } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { PropertyKindSchema, PropertyStatusSchema } from "@/db/schemas";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

const options = {
  kind: createStringOption({
    description: "Houses or vehicles",
    required: false,
    choices: [
      { name: "Houses", value: "house" },
      { name: "Vehicles", value: "vehicle" },
    ],
  }),
  status: createStringOption({
    description: "Availability",
    required: false,
    choices: [
      { name: "Vacant", value: "vacant" },
      { name: "Owned", value: "owned" },
      { name: "Rented", value: "rented" },
    ],
  }),
  district: createStringOption({
    description: "District (houses)",
    required: false,
  }),
};

@Declare({
  name: "list",
  description: "Browse houses and vehicles",
})
@Options(options)
export default class PropertyListSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const engine = getWorldEngine();
    const actor = resolveActor(ctx);
    const kind = PropertyKindSchema.safeParse(ctx.options.kind);
    const status = PropertyStatusSchema.safeParse(ctx.options.status);

    const result = await engine.listProperties(actor, {
      kind: kind.success ? kind.data : undefined,
      status: status.success ? status.data : undefined,
      district: ctx.options.district,
    });
    if (result.isErr()) return replyError(ctx, result.error);
    const districts = await engine.districts(actor);

    const lines = result
      .unwrap()
      .slice(0, 25)
      .map((p) => {
        const where = p.district ? ` · ${p.district}` : "";
        const rent = p.rentPrice > 0 ? `${formatMoney(p.rentPrice)}/day` : "free";
        return `**${p.label}**${where} · ${p.status} · buy ${formatMoney(p.price)} · rent ${rent} (\`${p._id}\`)`;
      });

    await ctx.write({
      embeds: [
        {
          color: EmbedColors.Blue,
          title: "🏠 Property listings",
          description: lines.join("\n") || "Nothing matches.",
          footer: districts.isOk() && districts.unwrap().length
            ? { text: `Districts: ${districts.unwrap().join(", ")}` }
            : undefined,
        },
      ],
    });
  }
}
