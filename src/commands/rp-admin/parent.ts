import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "rp-admin",
  description: "World administration: balances, archival and audit trail",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
  defaultMemberPermissions: ["ManageGuild"],
})
@AutoLoad()
export default class RpAdminParentCommand extends Command {}
