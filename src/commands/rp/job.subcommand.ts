import { Declare, Options, SubCommand, createStringOption, type GuildCommandContext } from "seyfert";
import { getJobDefinition, getWorldEngine, listJobDefinitions } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  kind: createStringOption({
    description: "Job to take",
    required: true,
    choices: listJobDefinitions().map((job) => ({ name: job.label, value: job.kind })),
  }),
};

@Declare({
  name: "job",
  description: "Take a job",
})
@Options(options)
export default class RpJobSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const result = await getWorldEngine().assignJob(resolveActor(ctx), ctx.author.id, ctx.options.kind);
    if (result.isErr()) return replyError(ctx, result.error);

    const job = getJobDefinition(result.unwrap().job);
    await replyOk(ctx, `💼 You now work as **${job?.label ?? result.unwrap().job}**. Use \`/rp work\` to earn.`);
  }
}
