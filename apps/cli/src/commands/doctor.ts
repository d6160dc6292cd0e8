import { Command } from "@effect/cli";
import {
  detectDesktop,
  keyboardTypeName,
  ProfileService,
  ProfileStore,
  ShortcutsBackend,
  suggestKeyboardType,
} from "@keysync/core";
import { Effect, Option } from "effect";

import { printLines } from "~/render";

export const diagnose = Effect.fn("DoctorCli.diagnose")(function* () {
  const backend = yield* ShortcutsBackend;
  const store = yield* ProfileStore;
  const service = yield* ProfileService;

  const shortcuts = yield* backend.loadAllShortcuts();
  const modified = [...shortcuts.values()].filter((shortcut) => shortcut.isModified).length;
  const active = yield* service.activeProfile();

  return [
    `Detected desktop: ${yield* detectDesktop()}`,
    `Adapter: ${backend.desktop}`,
    `Categories: ${backend.getCategories().length}`,
    `Shortcuts: ${shortcuts.size} (${modified} modified)`,
    `Profiles: ${(yield* store.list()).length}`,
    `Active profile: ${Option.match(active, { onNone: () => "none", onSome: (profile) => profile.name })}`,
    `Suggested keyboard: ${keyboardTypeName(yield* suggestKeyboardType())}`,
  ];
});

export const doctorCommand = Command.make("doctor", {}, () =>
  diagnose().pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Report what keysync sees on this desktop"));
