import { Effect, Layer, Option } from "effect";

import { parseAccelerators } from "../../src/accelerator/codec";
import { ShortcutsBackend } from "../../src/backend/backend";
import { findConflictsWith } from "../../src/backend/conflicts";
import { nextCustomId } from "../../src/backend/custom";
import { NativeStoreError } from "../../src/backend/errors";
import { CUSTOM_CATEGORY_ID } from "../../src/model/category";
import { type CustomKeybinding, Shortcut } from "../../src/model/shortcut";

export interface FakeShortcut {
  /** `container.key`, or a launcher path when `custom` is set. */
  readonly id: string;
  readonly current: ReadonlyArray<string>;
  readonly defaults?: ReadonlyArray<string>;
  readonly allowMultiple?: boolean;
  readonly custom?: boolean;
}

/**
 * Backend over a plain map of accelerator lists. Every load builds fresh
 * `Shortcut` objects, as the native adapters do.
 */
export function memoryBackend(
  shortcuts: ReadonlyArray<FakeShortcut>,
  options: {
    readonly failSaves?: ReadonlyArray<string>;
    readonly customs?: ReadonlyArray<CustomKeybinding>;
    readonly desktop?: "gnome" | "kde";
  } = {},
) {
  const fakes = new Map(shortcuts.map((fake) => [fake.id, fake] as const));
  const state = new Map(shortcuts.map((fake) => [fake.id, [...fake.current]] as const));
  const saves: Array<string> = [];
  const resets: Array<string> = [];
  const customs: Array<CustomKeybinding> = [...(options.customs ?? [])];

  const toShortcut = (fake: FakeShortcut): Shortcut => {
    const split = fake.id.lastIndexOf(".");
    return new Shortcut({
      id: fake.id,
      name: fake.id,
      category: fake.custom === true ? CUSTOM_CATEGORY_ID : "shell",
      location: fake.custom === true
        ? { container: "custom", key: fake.id }
        : { container: fake.id.slice(0, split), key: fake.id.slice(split + 1) },
      bindings: parseAccelerators(state.get(fake.id) ?? []),
      defaultBindings: parseAccelerators(fake.defaults ?? []),
      allowMultiple: fake.allowMultiple ?? true,
    });
  };

  const loadAllShortcuts = () =>
    Effect.sync(() => new Map([...fakes.values()].map((fake) => [fake.id, toShortcut(fake)] as const)));

  const layer = Layer.succeed(
    ShortcutsBackend,
    ShortcutsBackend.of({
      desktop: options.desktop ?? "gnome",
      getCategories: () => [],
      loadAllShortcuts,
      saveShortcut: (shortcut) =>
        Effect.suspend((): Effect.Effect<boolean, NativeStoreError> => {
          if (options.failSaves?.includes(shortcut.id) === true) {
            return Effect.fail(
              new NativeStoreError({ store: "memory", operation: "save", message: "read-only" }),
            );
          }
          if (!state.has(shortcut.id)) {
            return Effect.succeed(false);
          }
          state.set(shortcut.id, shortcut.accelerators);
          saves.push(shortcut.id);
          return Effect.succeed(true);
        }),
      resetShortcut: (shortcut) =>
        Effect.sync(() => {
          const fake = fakes.get(shortcut.id);
          if (fake === undefined) {
            return false;
          }
          state.set(shortcut.id, [...(fake.defaults ?? [])]);
          shortcut.resetToDefault();
          resets.push(shortcut.id);
          return true;
        }),
      findConflicts: findConflictsWith(loadAllShortcuts),
      getCustomKeybindings: () => Effect.sync(() => [...customs]),
      addCustomKeybinding: (name, command, binding) =>
        Effect.sync(() => {
          const path = `/${nextCustomId(customs.map((custom) => custom.path))}/`;
          customs.push({ path, name, command, binding });
          return Option.some(path);
        }),
      updateCustomKeybinding: (path, patch) =>
        Effect.sync(() => {
          const index = customs.findIndex((custom) => custom.path === path);
          const existing = customs[index];
          if (existing === undefined) {
            return false;
          }
          customs[index] = { ...existing, ...patch };
          return true;
        }),
      deleteCustomKeybinding: (path) =>
        Effect.sync(() => {
          const index = customs.findIndex((custom) => custom.path === path);
          if (index < 0) {
            return false;
          }
          customs.splice(index, 1);
          return true;
        }),
    }),
  );

  return {
    layer,
    /** Current accelerators as stored. */
    current: (id: string) => state.get(id),
    saves,
    resets,
    /** Launchers as stored. */
    customs,
  };
}
