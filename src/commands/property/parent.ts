import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "property",
  description: "Houses and vehicles: browse, buy, rent and vacate",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class PropertyParentCommand extends Command {}
