import { Args, Command, Options } from "@effect/cli";
import {
  type CustomKeybindingPatch,
  normalizeAccelerator,
  setupDefaultLaunchers,
  ShortcutsBackend,
} from "@keysync/core";
import { Effect, Option } from "effect";

import { CliError } from "~/errors";
import { customLine, launcherSetupLine, printLines } from "~/render";

const canonicalBinding = (
  text: string,
  operation: string,
): Effect.Effect<string, CliError> => {
  const normalized = normalizeAccelerator(text);
  return normalized === null
    ? Effect.fail(new CliError({ operation, message: `Not a valid accelerator: ${text}` }))
    : Effect.succeed(normalized);
};

export const listCustom = Effect.fn("CustomCli.list")(function* () {
  const backend = yield* ShortcutsBackend;
  return (yield* backend.getCustomKeybindings()).map(customLine);
});

export const addCustom = Effect.fn("CustomCli.add")(function* (options: {
  readonly name: string;
  readonly command: string;
  readonly binding: string;
}) {
  const backend = yield* ShortcutsBackend;
  const binding = yield* canonicalBinding(options.binding, "add");
  const path = yield* backend.addCustomKeybinding(options.name, options.command, binding);
  if (Option.isNone(path)) {
    return yield* new CliError({ operation: "add", message: `Could not add ${options.name}` });
  }
  return [path.value];
});

export const updateCustom = Effect.fn("CustomCli.update")(function* (
  path: string,
  options: {
    readonly name: Option.Option<string>;
    readonly command: Option.Option<string>;
    readonly binding: Option.Option<string>;
  },
) {
  const backend = yield* ShortcutsBackend;
  let patch: CustomKeybindingPatch = {};
  if (Option.isSome(options.name)) {
    patch = { ...patch, name: options.name.value };
  }
  if (Option.isSome(options.command)) {
    patch = { ...patch, command: options.command.value };
  }
  if (Option.isSome(options.binding)) {
    patch = { ...patch, binding: yield* canonicalBinding(options.binding.value, "update") };
  }
  if (!(yield* backend.updateCustomKeybinding(path, patch))) {
    return yield* new CliError({ operation: "update", message: `No launcher at ${path}` });
  }
  return [`Updated ${path}`];
});

export const deleteCustom = Effect.fn("CustomCli.delete")(function* (path: string) {
  const backend = yield* ShortcutsBackend;
  if (!(yield* backend.deleteCustomKeybinding(path))) {
    return yield* new CliError({ operation: "delete", message: `No launcher at ${path}` });
  }
  return [`Deleted ${path}`];
});

/** Terminal, files, browser and music launchers pointed at the installed apps. */
export const setupDefaults = Effect.fn("CustomCli.defaults")(function* () {
  return (yield* setupDefaultLaunchers()).map(launcherSetupLine);
});

const path = Args.text({ name: "path" });

const listCommand = Command.make("list", {}, () => listCustom().pipe(Effect.flatMap(printLines))).pipe(
  Command.withDescription("List launcher shortcuts"),
);

const addCommand = Command.make(
  "add",
  {
    name: Options.text("name"),
    command: Options.text("command"),
    binding: Options.text("binding"),
  },
  (options) => addCustom(options).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Add a launcher shortcut"));

const updateCommand = Command.make(
  "update",
  {
    path,
    name: Options.text("name").pipe(Options.optional),
    command: Options.text("command").pipe(Options.optional),
    binding: Options.text("binding").pipe(Options.optional),
  },
  ({ path, ...options }) => updateCustom(path, options).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Change a launcher's name, command or binding"));

const deleteCommand = Command.make("delete", { path }, ({ path }) =>
  deleteCustom(path).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Remove a launcher shortcut"));

const defaultsCommand = Command.make("defaults", {}, () =>
  setupDefaults().pipe(Effect.flatMap(printLines)),
).pipe(
  Command.withDescription("Point terminal, files, browser and music launchers at installed apps"),
);

export const customCommand = Command.make("custom").pipe(
  Command.withDescription("Manage launcher shortcuts"),
  Command.withSubcommands([
    listCommand,
    addCommand,
    updateCommand,
    deleteCommand,
    defaultsCommand,
  ]),
);
