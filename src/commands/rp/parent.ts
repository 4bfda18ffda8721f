/**
 * Role-play world commands (parent).
 *
 * Purpose: citizen life in `/rp`: registration, profile, jobs, payments and
 * world-wide lookups. Businesses, property and the law live in their own
 * parents so no command exceeds Discord's subcommand limit.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "rp",
  description: "City life: register, work, pay and look around",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class RpParentCommand extends Command {}
