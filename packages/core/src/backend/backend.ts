import { Context, type Effect, type Option } from "effect";

import type { KeyBinding } from "../model/binding";
import type { ShortcutCategory } from "../model/category";
import type { CustomKeybinding, CustomKeybindingPatch, Shortcut } from "../model/shortcut";

import type { NativeStoreError } from "./errors";

export type DesktopEnvironment = "gnome" | "kde" | "unknown";

/**
 * Capability contract every native adapter implements. Not-found locations
 * surface as `false` or `Option.none()`; only a store that cannot be read (or
 * a whole-file write that fails) is reported through the error channel.
 */
export interface ShortcutsBackendShape {
  readonly desktop: Exclude<DesktopEnvironment, "unknown">;
  readonly getCategories: () => ReadonlyArray<ShortcutCategory>;
  /** Full scan, custom launchers included. Never writes. */
  readonly loadAllShortcuts: () => Effect.Effect<Map<string, Shortcut>, NativeStoreError>;
  readonly saveShortcut: (shortcut: Shortcut) => Effect.Effect<boolean, NativeStoreError>;
  /** Restores the native default and updates `shortcut` in place. */
  readonly resetShortcut: (shortcut: Shortcut) => Effect.Effect<boolean, NativeStoreError>;
  readonly findConflicts: (
    binding: KeyBinding,
    excludeId?: string,
  ) => Effect.Effect<Array<Shortcut>, NativeStoreError>;
  readonly getCustomKeybindings: () => Effect.Effect<Array<CustomKeybinding>, NativeStoreError>;
  readonly addCustomKeybinding: (
    name: string,
    command: string,
    binding: string,
  ) => Effect.Effect<Option.Option<string>, NativeStoreError>;
  readonly updateCustomKeybinding: (
    path: string,
    patch: CustomKeybindingPatch,
  ) => Effect.Effect<boolean, NativeStoreError>;
  readonly deleteCustomKeybinding: (path: string) => Effect.Effect<boolean, NativeStoreError>;
}

export class ShortcutsBackend extends Context.Tag("@keysync/ShortcutsBackend")<
  ShortcutsBackend,
  ShortcutsBackendShape
>() {}
