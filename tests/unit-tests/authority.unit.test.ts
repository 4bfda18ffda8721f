import { PermissionsBitField } from "seyfert/lib/structures/extra/Permissions";
import { PermissionFlagsBits } from "seyfert/lib/types";
import { holdsAnyPermission } from "../../src/utils/worldCommand";
import { assertEqual } from "../db-tests/_utils/assert";
import { ops, type Suite } from "../db-tests/_utils/runner";

const moderator = () => new PermissionsBitField(PermissionFlagsBits.ModerateMembers);

export const suite: Suite = {
  name: "World authority",
  tests: [
    {
      name: "one configured permission is enough",
      ops: [ops.other],
      async run() {
        assertEqual(
          holdsAnyPermission(moderator(), ["ManageGuild", "ModerateMembers"]),
          true,
          "moderator is an authority",
        );
        assertEqual(
          holdsAnyPermission(
            new PermissionsBitField(PermissionFlagsBits.ManageGuild | PermissionFlagsBits.ModerateMembers),
            ["ManageGuild", "ModerateMembers"],
          ),
          true,
          "both held",
        );
      },
    },
    {
      name: "members without a configured permission stay citizens",
      ops: [ops.other],
      async run() {
        assertEqual(holdsAnyPermission(moderator(), ["ManageGuild"]), false, "moderate only");
        assertEqual(
          holdsAnyPermission(new PermissionsBitField(0n), ["ManageGuild", "ModerateMembers"]),
          false,
          "no permissions",
        );
        assertEqual(holdsAnyPermission(undefined, ["ManageGuild"]), false, "no member");
      },
    },
  ],
};
