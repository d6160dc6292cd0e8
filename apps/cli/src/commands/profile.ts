import { Args, Command, Options } from "@effect/cli";
import { ProfileNotFoundError, ProfileService, ProfileStore } from "@keysync/core";
import { Effect, Option } from "effect";

import { deltaLines, printLines, profileDetails, profileLine } from "~/render";

export type ApplyMode = "auto" | "clean" | "merge";

const APPLY_MODES: ReadonlyArray<ApplyMode> = ["auto", "clean", "merge"];

export const requireProfile = Effect.fn("ProfileCli.requireProfile")(function* (name: string) {
  const store = yield* ProfileStore;
  const profile = yield* store.get(name);
  if (Option.isNone(profile)) {
    return yield* new ProfileNotFoundError({ name, message: `No profile named ${name}` });
  }
  return profile.value;
});

export const listProfiles = Effect.fn("ProfileCli.list")(function* () {
  const store = yield* ProfileStore;
  return (yield* store.list()).map(profileLine);
});

export const showProfile = Effect.fn("ProfileCli.show")(function* (name: string) {
  return profileDetails(yield* requireProfile(name));
});

export const diffProfile = Effect.fn("ProfileCli.diff")(function* (name: string) {
  const service = yield* ProfileService;
  const deltas = yield* service.diff(yield* requireProfile(name));
  return deltas.size === 0 ? [`${name} matches the desktop`] : deltaLines(deltas);
});

/**
 * Applies a profile. With a previous profile, shortcuts only it mentioned are
 * first put back to their defaults.
 */
export const applyProfile = Effect.fn("ProfileCli.apply")(function* (
  name: string,
  options: { readonly mode: ApplyMode; readonly previous: Option.Option<string> },
) {
  const service = yield* ProfileService;
  const profile = yield* requireProfile(name);

  const lines: Array<string> = [];
  if (Option.isSome(options.previous)) {
    const previous = yield* requireProfile(options.previous.value);
    const reset = yield* service.resetOrphanedShortcuts(previous, profile);
    lines.push(`Reset ${reset} shortcut(s) left over from ${previous.name}`);
  }

  const changed = yield* service.apply(
    profile,
    options.mode === "auto" ? {} : { cleanSlate: options.mode === "clean" },
  );
  lines.push(`Applied ${profile.name}: ${changed.size} shortcut(s) changed`);
  lines.push(...[...changed.keys()].sort().map((id) => `  ${id}`));
  return lines;
});

export const saveCurrent = Effect.fn("ProfileCli.save")(function* (
  name: string,
  description: string,
) {
  const service = yield* ProfileService;
  const store = yield* ProfileStore;
  const profile = yield* service.createFromCurrent(name, description);
  return [`Saved ${Object.keys(profile.shortcuts).length} shortcut(s) to ${yield* store.save(profile)}`];
});

export const deleteProfile = Effect.fn("ProfileCli.delete")(function* (name: string) {
  const store = yield* ProfileStore;
  yield* store.delete(name);
  return [`Deleted ${name}`];
});

export const importProfile = Effect.fn("ProfileCli.import")(function* (path: string) {
  const store = yield* ProfileStore;
  const profile = yield* store.import(path);
  return [`Imported ${profile.name}`];
});

export const exportProfile = Effect.fn("ProfileCli.export")(function* (name: string, path: string) {
  const store = yield* ProfileStore;
  yield* store.export(name, path);
  return [`Exported ${name} to ${path}`];
});

export const showModifications = Effect.fn("ProfileCli.mods")(function* (preset: string) {
  const service = yield* ProfileService;
  const deltas = yield* service.getUserModifications(preset);
  return deltas.size === 0 ? [`No changes on top of ${preset}`] : deltaLines(deltas);
});

export const exportModifications = Effect.fn("ProfileCli.exportMods")(function* (preset: string) {
  const service = yield* ProfileService;
  const result = yield* service.exportAndClearModifications(preset);
  return Option.match(result.path, {
    onNone: () => [`No changes on top of ${preset}`],
    onSome: (path) => [`Exported ${result.count} shortcut(s) to ${path}`, `Restored ${preset}`],
  });
});

const name = Args.text({ name: "name" });
const preset = Args.text({ name: "preset" });

const listCommand = Command.make("list", {}, () =>
  listProfiles().pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("List saved profiles and presets"));

const showCommand = Command.make("show", { name }, ({ name }) =>
  showProfile(name).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Print a profile"));

const diffCommand = Command.make("diff", { name }, ({ name }) =>
  diffProfile(name).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Compare a profile with the desktop"));

const applyCommand = Command.make(
  "apply",
  {
    name,
    mode: Options.choice("mode", APPLY_MODES).pipe(
      Options.withDescription("clean disables everything else first; auto does so for presets"),
      Options.withDefault("auto"),
    ),
    previous: Options.text("previous").pipe(
      Options.withDescription("Profile being replaced; its leftovers are reset"),
      Options.optional,
    ),
  },
  ({ name, ...options }) => applyProfile(name, options).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Apply a profile to the desktop"));

const saveCommand = Command.make(
  "save",
  {
    name,
    description: Options.text("description").pipe(Options.withDefault("")),
  },
  ({ name, description }) => saveCurrent(name, description).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Save the current shortcuts as a profile"));

const deleteCommand = Command.make("delete", { name }, ({ name }) =>
  deleteProfile(name).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Delete a user profile"));

const importCommand = Command.make("import", { path: Args.text({ name: "path" }) }, ({ path }) =>
  importProfile(path).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Copy a profile file into the profile directory"));

const exportCommand = Command.make(
  "export",
  { name, path: Args.text({ name: "path" }) },
  ({ name, path }) => exportProfile(name, path).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Write a profile to a file"));

const modsCommand = Command.make("mods", { preset }, ({ preset }) =>
  showModifications(preset).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Show changes made on top of a preset"));

const exportModsCommand = Command.make("export-mods", { preset }, ({ preset }) =>
  exportModifications(preset).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Save changes on top of a preset, then restore the preset"));

export const profileCommand = Command.make("profile").pipe(
  Command.withDescription("Manage and apply shortcut profiles"),
  Command.withSubcommands([
    listCommand,
    showCommand,
    diffCommand,
    applyCommand,
    saveCommand,
    deleteCommand,
    importCommand,
    exportCommand,
    modsCommand,
    exportModsCommand,
  ]),
);
