/**
 * Law enforcement commands (parent).
 *
 * Issuing or clearing warrants and fines needs an authority; citizens can
 * list and pay their own fines.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "law",
  description: "Warrants and fines",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class LawParentCommand extends Command {}
