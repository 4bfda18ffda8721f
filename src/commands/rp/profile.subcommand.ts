/**
 * Profile Subcommand (Part of /rp).
 *
 * Purpose: citizen card with balance, job, holdings and legal status.
 */
import { Declare, Options, SubCommand, createUserOption, type GuildCommandContext } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { formatMoney, getWorldEngine, relativeTime } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

const options = {
  user: createUserOption({
    description: "Citizen to look up (defaults to you)",
    required: false,
  }),
};

@Declare({
  name: "profile",
  description: "Show a citizen's profile",
})
@Options(options)
export default class RpProfileSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const actor = resolveActor(ctx);
    const target = ctx.options.user ?? ctx.author;
    const result = await getWorldEngine().profile(actor, target.id);
    if (result.isErr()) return replyError(ctx, result.error);

    const profile = result.unwrap();
    const { citizen } = profile;
    const fineTotal = profile.unpaidFines.reduce((sum, fine) => sum + fine.amount, 0);
    const nextShift = profile.employment?.lastEarnAt && profile.job
      ? new Date(profile.employment.lastEarnAt.getTime() + profile.job.cooldownMinutes * 60_000)
      : null;

    await ctx.write({
      embeds: [
        {
          color: citizen.wanted ? EmbedColors.Red : EmbedColors.Blue,
          title: `${citizen.displayName}${citizen.status === "archived" ? " (archived)" : ""}`,
          fields: [
            { name: "Age", value: `${citizen.age}`, inline: true },
            { name: "Balance", value: formatMoney(profile.balance), inline: true },
            { name: "Job", value: profile.job?.label ?? citizen.job, inline: true },
            {
              name: "Shifts worked",
              value: `${profile.employment?.earnCount ?? 0}${nextShift ? ` · next ${relativeTime(nextShift)}` : ""}`,
              inline: true,
            },
            {
              name: "Businesses",
              value: profile.businesses.map((b) => `${b.name} (\`${b._id}\`)`).join("\n") || "None",
            },
            {
              name: "Property",
              value:
                profile.properties
                  .map((p) => `${p.label} · ${p.status} (\`${p._id}\`)`)
                  .join("\n") || "None",
            },
            {
              name: "Legal",
              value: [
                profile.activeWanted ? `🚨 Wanted: ${profile.activeWanted.reason}` : "Not wanted",
                profile.unpaidFines.length
                  ? `${profile.unpaidFines.length} unpaid fine(s), ${formatMoney(fineTotal)}`
                  : "No unpaid fines",
              ].join("\n"),
            },
          ],
        },
      ],
    });
  }
}
