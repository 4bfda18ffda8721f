import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "business",
  description: "Found and run businesses",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class BusinessParentCommand extends Command {}
