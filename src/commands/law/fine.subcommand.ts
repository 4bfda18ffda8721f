import {
  Declare,
  Options,
  SubCommand,
  createIntegerOption,
  createStringOption,
  createUserOption,
  type GuildCommandContext,
} from "seyfert";
import { formatMoney, getWorldEngine } from "@/modules/world";
import { replyError, replyOk, resolveActor } from "@/utils/worldCommand";

const options = {
  user: createUserOption({
    description: "Citizen to fine",
    required: true,
  }),
  amount: createIntegerOption({
    description: "Fine amount",
    required: true,
    min_value: 1,
  }),
  reason: createStringOption({
    description: "Offence",
    required: true,
    max_length: 200,
  }),
};

@Declare({
  name: "fine",
  description: "Issue a fine (authorities)",
  defaultMemberPermissions: ["ManageGuild"],
})
@Options(options)
export default class LawFineSubcommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { user, amount, reason } = ctx.options;
    const result = await getWorldEngine().issueFine(resolveActor(ctx), user.id, amount, reason);
    if (result.isErr()) return replyError(ctx, result.error);

    const fine = result.unwrap();
    await replyOk(
      ctx,
      `🧾 ${user.toString()} was fined ${formatMoney(fine.amount)} for ${fine.reason}. Fine id: \`${fine._id}\`.`,
    );
  }
}
