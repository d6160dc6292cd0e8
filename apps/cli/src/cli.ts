import { Command } from "@effect/cli";

import { customCommand } from "~/commands/custom";
import { doctorCommand } from "~/commands/doctor";
import { profileCommand } from "~/commands/profile";
import { shortcutsCommand } from "~/commands/shortcuts";

export const keysyncCommand = Command.make("keysync").pipe(
  Command.withDescription("Keyboard shortcut profiles for GNOME and KDE"),
  Command.withSubcommands([shortcutsCommand, customCommand, profileCommand, doctorCommand]),
);

export const cli = Command.run(keysyncCommand, {
  name: "keysync",
  version: "0.1.0",
});
