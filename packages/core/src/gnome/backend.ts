import { Effect, Layer, Option } from "effect";

import { parseNativeBindings } from "../backend/bindings";
import { ShortcutsBackend } from "../backend/backend";
import { findConflictsWith } from "../backend/conflicts";
import type { NativeStoreError } from "../backend/errors";
import { nextCustomId } from "../backend/custom";
import { CUSTOM_CATEGORY_ID } from "../model/category";
import { type CustomKeybinding, type CustomKeybindingPatch, Shortcut } from "../model/shortcut";

import {
  GNOME_CATEGORIES,
  humanizeKeyName,
  INTERNAL_GROUP,
  isShortcutKey,
  keyCategory,
  SHORTCUT_SCHEMAS,
  type ShortcutSchema,
  shortcutGroup,
} from "./classify";
import { GSettingsClient, type GSettingsKey, relocatable } from "./client";
import { GVariant, gvariantStrings } from "./gvariant";

export const CUSTOM_SCHEMA = "org.gnome.settings-daemon.plugins.media-keys";
export const CUSTOM_LIST_KEY = "custom-keybindings";
export const CUSTOM_BINDING_SCHEMA =
  "org.gnome.settings-daemon.plugins.media-keys.custom-keybinding";
export const CUSTOM_PATH_PREFIX =
  "/org/gnome/settings-daemon/plugins/media-keys/custom-keybindings";

const CUSTOM_CONTAINER = "custom";
const DESCRIBE_CONCURRENCY = 8;

export const customShortcutId = (path: string): string => `custom:${path}`;

export const makeGnomeBackend = Effect.gen(function* () {
  const client = yield* GSettingsClient;

  const toShortcut = Effect.fn("GnomeBackend.toShortcut")(function* (
    info: ShortcutSchema,
    entry: GSettingsKey,
  ) {
    const source = `${info.schema}.${entry.key}`;
    const description = yield* client
      .describe(info.schema, entry.key)
      .pipe(Effect.orElseSucceed(() => ""));

    return new Shortcut({
      id: source,
      name: humanizeKeyName(entry.key),
      description,
      category: keyCategory(entry.key, info.category),
      group: shortcutGroup(entry.key),
      location: { container: info.schema, key: entry.key },
      bindings: yield* parseNativeBindings(gvariantStrings(entry.value), source),
      defaultBindings: yield* parseNativeBindings(gvariantStrings(entry.defaultValue), source),
      allowMultiple: GVariant.$is("StringArray")(entry.value),
    });
  });

  const loadSchema = Effect.fn("GnomeBackend.loadSchema")(function* (info: ShortcutSchema) {
    const keys = yield* client.listKeys(info.schema);
    const candidates = keys.filter(
      (entry) =>
        // The launcher path list is a plain `as` key that the heuristic accepts
        !(info.schema === CUSTOM_SCHEMA && entry.key === CUSTOM_LIST_KEY) &&
        isShortcutKey(entry.key, entry.defaultValue) &&
        humanizeKeyName(entry.key) !== "" &&
        shortcutGroup(entry.key) !== INTERNAL_GROUP,
    );
    return yield* Effect.forEach(candidates, (entry) => toShortcut(info, entry), {
      concurrency: DESCRIBE_CONCURRENCY,
    });
  });

  const readCustomPaths = client.get(CUSTOM_SCHEMA, CUSTOM_LIST_KEY).pipe(
    Effect.map((value) => Option.some([...gvariantStrings(value)])),
    Effect.catchAll((error) =>
      Effect.logWarning("Custom keybinding list is unavailable", { error: error.message }).pipe(
        Effect.as(Option.none<Array<string>>()),
      ),
    ),
  );

  const readCustomString = (path: string, key: string) =>
    client
      .get(relocatable(CUSTOM_BINDING_SCHEMA, path), key)
      .pipe(Effect.map((value) => gvariantStrings(value)[0] ?? ""));

  const getCustomKeybindings = Effect.fn("GnomeBackend.getCustomKeybindings")(function* () {
    const paths = Option.getOrElse(yield* readCustomPaths, () => []);
    const bindings: Array<CustomKeybinding> = [];
    for (const path of paths) {
      const entry = yield* Effect.all({
        name: readCustomString(path, "name"),
        command: readCustomString(path, "command"),
        binding: readCustomString(path, "binding"),
      }).pipe(Effect.option);
      if (Option.isNone(entry)) {
        yield* Effect.logWarning("Skipping unreadable custom keybinding", { path });
        continue;
      }
      bindings.push({ path, ...entry.value });
    }
    return bindings;
  });

  const loadCustomShortcuts = Effect.fn("GnomeBackend.loadCustomShortcuts")(function* () {
    const customs = yield* getCustomKeybindings();
    return yield* Effect.forEach(customs, (custom) =>
      parseNativeBindings([custom.binding], custom.path).pipe(
        Effect.map(
          (bindings) =>
            new Shortcut({
              id: customShortcutId(custom.path),
              name: custom.name || "Custom Shortcut",
              description: custom.command,
              category: CUSTOM_CATEGORY_ID,
              group: "Launchers",
              location: { container: CUSTOM_CONTAINER, key: custom.path },
              bindings,
              allowMultiple: false,
            }),
        ),
      ),
    );
  });

  const loadAllShortcuts = Effect.fn("GnomeBackend.loadAllShortcuts")(function* () {
    const installed = yield* client.listSchemas();
    const shortcuts = new Map<string, Shortcut>();

    for (const info of SHORTCUT_SCHEMAS) {
      if (!installed.has(info.schema)) {
        continue;
      }
      for (const shortcut of yield* loadSchema(info)) {
        shortcuts.set(shortcut.id, shortcut);
      }
    }

    for (const shortcut of yield* loadCustomShortcuts()) {
      shortcuts.set(shortcut.id, shortcut);
    }
    return shortcuts;
  });

  const addCustomKeybinding = Effect.fn("GnomeBackend.addCustomKeybinding")(function* (
    name: string,
    command: string,
    binding: string,
  ) {
    const listed = yield* readCustomPaths;
    if (Option.isNone(listed)) {
      return Option.none<string>();
    }

    const path = `${CUSTOM_PATH_PREFIX}/${nextCustomId(listed.value)}/`;
    const address = relocatable(CUSTOM_BINDING_SCHEMA, path);
    yield* client.set(address, "name", GVariant.String({ value: name }));
    yield* client.set(address, "command", GVariant.String({ value: command }));
    yield* client.set(address, "binding", GVariant.String({ value: binding }));
    yield* client.set(
      CUSTOM_SCHEMA,
      CUSTOM_LIST_KEY,
      GVariant.StringArray({ value: [...listed.value, path] }),
    );
    return Option.some(path);
  });

  const updateCustomKeybinding = Effect.fn("GnomeBackend.updateCustomKeybinding")(function* (
    path: string,
    patch: CustomKeybindingPatch,
  ) {
    const listed = yield* readCustomPaths;
    if (Option.isNone(listed) || !listed.value.includes(path)) {
      return false;
    }

    const address = relocatable(CUSTOM_BINDING_SCHEMA, path);
    for (const field of ["name", "command", "binding"] as const) {
      const value = patch[field];
      if (value !== undefined) {
        yield* client.set(address, field, GVariant.String({ value }));
      }
    }
    return true;
  });

  const deleteCustomKeybinding = Effect.fn("GnomeBackend.deleteCustomKeybinding")(function* (
    path: string,
  ) {
    const listed = yield* readCustomPaths;
    if (Option.isNone(listed) || !listed.value.includes(path)) {
      return false;
    }

    const address = relocatable(CUSTOM_BINDING_SCHEMA, path);
    yield* Effect.forEach(["name", "command", "binding"], (key) => client.reset(address, key), {
      discard: true,
    });
    yield* client.set(
      CUSTOM_SCHEMA,
      CUSTOM_LIST_KEY,
      GVariant.StringArray({ value: listed.value.filter((candidate) => candidate !== path) }),
    );
    return true;
  });

  const writeFixedShortcut = Effect.fn("GnomeBackend.writeFixedShortcut")(function* (
    shortcut: Shortcut,
  ) {
    const { container: schema, key } = shortcut.location;
    const current = yield* client.get(schema, key).pipe(Effect.option);
    if (Option.isNone(current)) {
      yield* Effect.logDebug("Shortcut location no longer exists", { schema, key });
      return false;
    }

    // Empty bindings are written as the disabled sentinel, never deleted
    const accelerators = shortcut.accelerators;
    const value = GVariant.$match(current.value, {
      StringArray: () =>
        Option.some(
          GVariant.StringArray({ value: accelerators.length > 0 ? accelerators : ["disabled"] }),
        ),
      String: () => Option.some(GVariant.String({ value: accelerators[0] ?? "disabled" })),
      Other: () => Option.none<GVariant>(),
    });
    if (Option.isNone(value)) {
      return false;
    }

    yield* client.set(schema, key, value.value);
    return true;
  });

  const saveShortcut = (shortcut: Shortcut) => {
    const write: Effect.Effect<boolean, NativeStoreError> =
      shortcut.location.container === CUSTOM_CONTAINER
        ? updateCustomKeybinding(shortcut.location.key, { binding: shortcut.accelerator })
        : writeFixedShortcut(shortcut);
    return write.pipe(
      Effect.catchAll((error) =>
        Effect.logWarning("Failed to save shortcut", { id: shortcut.id, error: error.message }).pipe(
          Effect.as(false),
        ),
      ),
    );
  };

  const resetShortcut = (shortcut: Shortcut) => {
    if (shortcut.location.container === CUSTOM_CONTAINER) {
      return Effect.succeed(false);
    }
    return client.reset(shortcut.location.container, shortcut.location.key).pipe(
      Effect.map(() => {
        shortcut.resetToDefault();
        return true;
      }),
      Effect.catchAll((error) =>
        Effect.logWarning("Failed to reset shortcut", { id: shortcut.id, error: error.message }).pipe(
          Effect.as(false),
        ),
      ),
    );
  };

  return ShortcutsBackend.of({
    desktop: "gnome",
    getCategories: () => GNOME_CATEGORIES,
    loadAllShortcuts,
    saveShortcut,
    resetShortcut,
    findConflicts: findConflictsWith(loadAllShortcuts),
    getCustomKeybindings,
    addCustomKeybinding,
    updateCustomKeybinding,
    deleteCustomKeybinding,
  });
});

export const GnomeShortcutsBackendLive = Layer.effect(ShortcutsBackend, makeGnomeBackend);
