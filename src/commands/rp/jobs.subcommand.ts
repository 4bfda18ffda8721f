import { Declare, SubCommand, type GuildCommandContext } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, resolveActor } from "@/utils/worldCommand";

@Declare({
  name: "jobs",
  description: "List the jobs on offer",
})
export default class RpJobsSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const result = await getWorldEngine().listJobs(resolveActor(ctx));
    if (result.isErr()) return replyError(ctx, result.error);

    await ctx.write({
      embeds: [
        {
          color: EmbedColors.Blue,
          title: "💼 Job board",
          description: result
            .unwrap()
            .map(
              (job) =>
                `**${job.label}** (\`${job.kind}\`): ${formatMoney(job.payout)} every ${job.cooldownMinutes} min\n${job.description}`,
            )
            .join("\n\n"),
        },
      ],
    });
  }
}
