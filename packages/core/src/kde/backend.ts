import { FileSystem } from "@effect/platform";
import { Effect, Layer, Option } from "effect";

import { normalizeAccelerator } from "../accelerator/codec";
import { ShortcutsBackend } from "../backend/backend";
import { parseNativeBindings } from "../backend/bindings";
import { findConflictsWith } from "../backend/conflicts";
import { nextCustomId } from "../backend/custom";
import { NativeStoreError } from "../backend/errors";
import { kglobalshortcutsPath } from "../config";
import type { KeyBinding } from "../model/binding";
import { CUSTOM_CATEGORY_ID, type ShortcutCategory } from "../model/category";
import { type CustomKeybinding, type CustomKeybindingPatch, Shortcut } from "../model/shortcut";

import {
  canonicalToKde,
  firstKdeShortcut,
  formatShortcutTriple,
  KDE_NONE,
  kdeToCanonical,
  parseShortcutTriple,
} from "./accelerator";
import { ShortcutDaemon } from "./daemon";
import { KConfigFile } from "./kconfig";

export const KHOTKEYS_GROUP = "khotkeys";

const CUSTOM_CONTAINER = "custom";

export const KDE_CATEGORIES: ReadonlyArray<ShortcutCategory> = [
  {
    id: "kwin",
    name: "Window Management",
    icon: "preferences-system-windows-symbolic",
    description: "KWin window manager shortcuts",
  },
  {
    id: "plasma",
    name: "Plasma",
    icon: "view-app-grid-symbolic",
    description: "Plasma desktop shortcuts",
  },
  {
    id: "media",
    name: "Media",
    icon: "multimedia-player-symbolic",
    description: "Media playback and volume controls",
  },
  {
    id: "apps",
    name: "Applications",
    icon: "application-x-addon-symbolic",
    description: "Application launchers",
  },
  {
    id: CUSTOM_CATEGORY_ID,
    name: "Custom",
    icon: "application-x-addon-symbolic",
    description: "User-defined shortcuts",
  },
];

// Matched as case-insensitive substrings of the component name, in order
const COMPONENT_CATEGORIES: ReadonlyArray<readonly [string, string]> = [
  ["kwin", "kwin"],
  ["ksmserver", "plasma"],
  ["plasmashell", "plasma"],
  ["org.kde.krunner.desktop", "apps"],
  ["org.kde.spectacle.desktop", "plasma"],
  ["org.kde.dolphin.desktop", "apps"],
  ["org.kde.konsole.desktop", "apps"],
  ["kmix", "media"],
  ["org_kde_powerdevil", "plasma"],
  ["kded5", "plasma"],
  ["kded6", "plasma"],
  ["kaccess", "plasma"],
];

export function componentCategory(component: string): string {
  const lower = component.toLowerCase();
  const match = COMPONENT_CATEGORIES.find(([pattern]) => lower.includes(pattern));
  return match === undefined ? "apps" : match[1];
}

const titleCase = (key: string): string =>
  key
    .replace(/[_-]/g, " ")
    .replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

export const customShortcutId = (path: string): string => `custom:${path}`;

const customKey = (path: string): string | undefined =>
  path.startsWith(`${KHOTKEYS_GROUP}/`) ? path.slice(KHOTKEYS_GROUP.length + 1) : undefined;

export const makeKdeBackend = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const daemon = yield* ShortcutDaemon;
  const path = yield* kglobalshortcutsPath;

  const storeError = (operation: string) => (cause: unknown) =>
    new NativeStoreError({
      store: "kglobalshortcutsrc",
      operation,
      message: `Failed to ${operation} ${path}`,
      cause,
    });

  // Re-read on every operation: other tools edit this file while we run
  const read = Effect.fn("KdeBackend.read")(function* () {
    const exists = yield* fs.exists(path).pipe(Effect.mapError(storeError("read")));
    if (!exists) {
      return KConfigFile.parse("");
    }
    const text = yield* fs.readFileString(path).pipe(Effect.mapError(storeError("read")));
    return KConfigFile.parse(text);
  });

  const write = Effect.fn("KdeBackend.write")(function* (file: KConfigFile) {
    yield* fs.writeFileString(path, file.toString()).pipe(Effect.mapError(storeError("write")));
    yield* daemon.reload();
  });

  const bindingsFrom = (field: string, source: string): Effect.Effect<Array<KeyBinding>> => {
    const shortcut = firstKdeShortcut(field);
    const canonical = kdeToCanonical(shortcut);
    if (canonical !== null) {
      return parseNativeBindings([canonical], source);
    }
    if (shortcut === "" || shortcut.toLowerCase() === KDE_NONE) {
      return Effect.succeed([]);
    }
    return Effect.logWarning("Ignoring unparsable shortcut", { source, shortcut }).pipe(
      Effect.as([]),
    );
  };

  const getCustomKeybindings = Effect.fn("KdeBackend.getCustomKeybindings")(function* () {
    const file = yield* read();
    const customs: Array<CustomKeybinding> = [];
    for (const [key, value] of file.entries(KHOTKEYS_GROUP)) {
      if (key.startsWith("_")) {
        continue;
      }
      const triple = parseShortcutTriple(value);
      const canonical = kdeToCanonical(firstKdeShortcut(triple.current));
      customs.push({
        path: `${KHOTKEYS_GROUP}/${key}`,
        name: triple.description || key,
        command: "",
        binding: canonical === null ? "" : (normalizeAccelerator(canonical) ?? ""),
      });
    }
    return customs;
  });

  const loadAllShortcuts = Effect.fn("KdeBackend.loadAllShortcuts")(function* () {
    const file = yield* read();
    const shortcuts = new Map<string, Shortcut>();

    for (const group of file.groupNames()) {
      if (group === KHOTKEYS_GROUP) {
        continue;
      }
      const category = componentCategory(group);
      for (const [key, value] of file.entries(group)) {
        if (key.startsWith("_")) {
          continue;
        }
        const id = `${group}.${key}`;
        const triple = parseShortcutTriple(value);
        shortcuts.set(
          id,
          new Shortcut({
            id,
            name: titleCase(key),
            description: triple.description,
            category,
            group,
            location: { container: group, key },
            bindings: yield* bindingsFrom(triple.current, id),
            defaultBindings: yield* bindingsFrom(triple.defaultValue, id),
            allowMultiple: false,
          }),
        );
      }
    }

    for (const custom of yield* getCustomKeybindings()) {
      const id = customShortcutId(custom.path);
      shortcuts.set(
        id,
        new Shortcut({
          id,
          name: custom.name,
          category: CUSTOM_CATEGORY_ID,
          group: "Launchers",
          location: { container: CUSTOM_CONTAINER, key: custom.path },
          bindings: yield* parseNativeBindings([custom.binding], id),
          allowMultiple: false,
        }),
      );
    }
    return shortcuts;
  });

  const addCustomKeybinding = Effect.fn("KdeBackend.addCustomKeybinding")(function* (
    name: string,
    _command: string,
    binding: string,
  ) {
    const shortcut = canonicalToKde(binding);
    if (shortcut === null) {
      yield* Effect.logWarning("Binding has no KDE spelling", { binding });
      return Option.none<string>();
    }

    const file = yield* read();
    const key = nextCustomId(file.entries(KHOTKEYS_GROUP).map(([existing]) => existing));
    file.set(
      KHOTKEYS_GROUP,
      key,
      formatShortcutTriple({ current: shortcut, defaultValue: KDE_NONE, description: name }),
    );
    yield* write(file);
    return Option.some(`${KHOTKEYS_GROUP}/${key}`);
  });

  const updateCustomKeybinding = Effect.fn("KdeBackend.updateCustomKeybinding")(function* (
    customPath: string,
    patch: CustomKeybindingPatch,
  ) {
    const key = customKey(customPath);
    const file = yield* read();
    const existing = key === undefined ? undefined : file.get(KHOTKEYS_GROUP, key);
    if (key === undefined || existing === undefined) {
      return false;
    }

    const triple = parseShortcutTriple(existing);
    const current = patch.binding === undefined ? triple.current : canonicalToKde(patch.binding);
    if (current === null) {
      yield* Effect.logWarning("Binding has no KDE spelling", { binding: patch.binding });
      return false;
    }

    file.set(
      KHOTKEYS_GROUP,
      key,
      formatShortcutTriple({
        current,
        defaultValue: triple.defaultValue,
        description: patch.name ?? triple.description,
      }),
    );
    yield* write(file);
    return true;
  });

  const deleteCustomKeybinding = Effect.fn("KdeBackend.deleteCustomKeybinding")(function* (
    customPath: string,
  ) {
    const key = customKey(customPath);
    const file = yield* read();
    if (key === undefined || !file.remove(KHOTKEYS_GROUP, key)) {
      return false;
    }
    yield* write(file);
    return true;
  });

  const saveShortcut = Effect.fn("KdeBackend.saveShortcut")(function* (shortcut: Shortcut) {
    if (shortcut.location.container === CUSTOM_CONTAINER) {
      return yield* updateCustomKeybinding(shortcut.location.key, {
        binding: shortcut.accelerator,
      });
    }

    const { container: group, key } = shortcut.location;
    const file = yield* read();
    const existing = file.get(group, key);
    if (existing === undefined) {
      return false;
    }

    const current = canonicalToKde(shortcut.accelerator);
    if (current === null) {
      yield* Effect.logWarning("Binding has no KDE spelling", {
        id: shortcut.id,
        accelerator: shortcut.accelerator,
      });
      return false;
    }

    const triple = parseShortcutTriple(existing);
    file.set(group, key, formatShortcutTriple({ ...triple, current }));
    yield* write(file);
    return true;
  });

  const resetShortcut = Effect.fn("KdeBackend.resetShortcut")(function* (shortcut: Shortcut) {
    if (shortcut.location.container === CUSTOM_CONTAINER) {
      return false;
    }

    const { container: group, key } = shortcut.location;
    const file = yield* read();
    const existing = file.get(group, key);
    if (existing === undefined) {
      return false;
    }

    const triple = parseShortcutTriple(existing);
    file.set(group, key, formatShortcutTriple({ ...triple, current: triple.defaultValue }));
    yield* write(file);
    shortcut.resetToDefault();
    return true;
  });

  return ShortcutsBackend.of({
    desktop: "kde",
    getCategories: () => KDE_CATEGORIES,
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

export const KdeShortcutsBackendLive = Layer.effect(ShortcutsBackend, makeKdeBackend);
