import { Args, Command, Options } from "@effect/cli";
import {
  conflictGroups,
  type KeyBinding,
  parseAccelerator,
  ShortcutsBackend,
} from "@keysync/core";
import { Effect, Option } from "effect";

import { CliError } from "~/errors";
import { printLines, shortcutLine, shortcutTable } from "~/render";

export const parseBinding = (
  text: string,
  operation: string,
): Effect.Effect<KeyBinding, CliError> => {
  const binding = parseAccelerator(text);
  return binding === null
    ? Effect.fail(new CliError({ operation, message: `Not a valid accelerator: ${text}` }))
    : Effect.succeed(binding);
};

export const findShortcut = Effect.fn("ShortcutsCli.findShortcut")(function* (
  id: string,
  operation: string,
) {
  const backend = yield* ShortcutsBackend;
  const shortcut = (yield* backend.loadAllShortcuts()).get(id);
  if (shortcut === undefined) {
    return yield* new CliError({ operation, message: `No shortcut with id ${id}` });
  }
  return shortcut;
});

export const listShortcuts = Effect.fn("ShortcutsCli.list")(function* (options: {
  readonly category: Option.Option<string>;
  readonly modified: boolean;
}) {
  const backend = yield* ShortcutsBackend;
  const shortcuts = [...(yield* backend.loadAllShortcuts()).values()].filter(
    (shortcut) =>
      Option.match(options.category, {
        onNone: () => true,
        onSome: (category) => shortcut.category === category,
      }) &&
      (!options.modified || shortcut.isModified),
  );
  return shortcutTable(backend.getCategories(), shortcuts);
});

const warnAboutConflicts = Effect.fn("ShortcutsCli.warnAboutConflicts")(function* (
  id: string,
  bindings: ReadonlyArray<KeyBinding>,
) {
  const backend = yield* ShortcutsBackend;
  for (const binding of bindings) {
    const others = yield* backend.findConflicts(binding, id);
    if (others.length > 0) {
      yield* Effect.logWarning("Accelerator is already in use", {
        id,
        conflicts: others.map((other) => other.id),
      });
    }
  }
});

/** An empty accelerator list disables the shortcut. */
export const setShortcut = Effect.fn("ShortcutsCli.set")(function* (
  id: string,
  accelerators: ReadonlyArray<string>,
) {
  const backend = yield* ShortcutsBackend;
  const bindings = yield* Effect.forEach(accelerators, (text) => parseBinding(text, "set"));
  const shortcut = yield* findShortcut(id, "set");
  shortcut.setBindings(bindings);
  if (!(yield* backend.saveShortcut(shortcut))) {
    return yield* new CliError({ operation: "set", message: `Could not save ${id}` });
  }
  yield* warnAboutConflicts(id, shortcut.bindings);
  return [shortcutLine(shortcut)];
});

export const resetShortcut = Effect.fn("ShortcutsCli.reset")(function* (id: string) {
  const backend = yield* ShortcutsBackend;
  const shortcut = yield* findShortcut(id, "reset");
  if (!(yield* backend.resetShortcut(shortcut))) {
    return yield* new CliError({ operation: "reset", message: `Could not reset ${id}` });
  }
  return [shortcutLine(shortcut)];
});

/** Holders of one accelerator, or every clash when none is given. */
export const listConflicts = Effect.fn("ShortcutsCli.conflicts")(function* (
  accelerator: Option.Option<string>,
  exclude: Option.Option<string>,
) {
  const backend = yield* ShortcutsBackend;
  if (Option.isSome(accelerator)) {
    const binding = yield* parseBinding(accelerator.value, "conflicts");
    const holders = yield* backend.findConflicts(binding, Option.getOrUndefined(exclude));
    return holders.map(shortcutLine);
  }

  const groups = conflictGroups((yield* backend.loadAllShortcuts()).values());
  return [...groups.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .flatMap(([shared, holders]) => [`${shared}:`, ...holders.map(shortcutLine)]);
});

const listCommand = Command.make(
  "list",
  {
    category: Options.text("category").pipe(
      Options.withDescription("Only shortcuts in this category"),
      Options.optional,
    ),
    modified: Options.boolean("modified").pipe(
      Options.withDescription("Only shortcuts that differ from their default"),
    ),
  },
  (options) => listShortcuts(options).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("List shortcuts by category"));

const setCommand = Command.make(
  "set",
  {
    id: Args.text({ name: "id" }),
    accelerators: Args.text({ name: "accelerator" }).pipe(Args.repeated),
  },
  ({ id, accelerators }) => setShortcut(id, accelerators).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Bind a shortcut; no accelerator disables it"));

const resetCommand = Command.make("reset", { id: Args.text({ name: "id" }) }, ({ id }) =>
  resetShortcut(id).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Restore a shortcut's default"));

const conflictsCommand = Command.make(
  "conflicts",
  {
    accelerator: Args.text({ name: "accelerator" }).pipe(Args.optional),
    exclude: Options.text("exclude").pipe(
      Options.withDescription("Shortcut id to leave out"),
      Options.optional,
    ),
  },
  ({ accelerator, exclude }) =>
    listConflicts(accelerator, exclude).pipe(Effect.flatMap(printLines)),
).pipe(Command.withDescription("Show shortcuts sharing an accelerator"));

export const shortcutsCommand = Command.make("shortcuts").pipe(
  Command.withDescription("Inspect and edit individual shortcuts"),
  Command.withSubcommands([listCommand, setCommand, resetCommand, conflictsCommand]),
);
