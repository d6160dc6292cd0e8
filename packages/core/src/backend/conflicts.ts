import { Effect } from "effect";

import type { KeyBinding } from "../model/binding";
import type { Shortcut } from "../model/shortcut";

import type { NativeStoreError } from "./errors";

/** Every shortcut other than `excludeId` whose current bindings contain `binding`. */
export const conflictsIn = (
  shortcuts: Iterable<Shortcut>,
  binding: KeyBinding,
  excludeId?: string,
): Array<Shortcut> =>
  [...shortcuts].filter((shortcut) => shortcut.id !== excludeId && shortcut.hasBinding(binding));

/** Re-scans the store on every call; conflict checks are not a hot path. */
export const findConflictsWith =
  (loadAll: () => Effect.Effect<Map<string, Shortcut>, NativeStoreError>) =>
  (binding: KeyBinding, excludeId?: string) =>
    loadAll().pipe(Effect.map((shortcuts) => conflictsIn(shortcuts.values(), binding, excludeId)));

/** Groups of shortcut ids that share at least one accelerator, keyed by that accelerator. */
export const conflictGroups = (
  shortcuts: Iterable<Shortcut>,
): Map<string, Array<Shortcut>> => {
  const byAccelerator = new Map<string, Array<Shortcut>>();
  for (const shortcut of shortcuts) {
    for (const accelerator of shortcut.accelerators) {
      const group = byAccelerator.get(accelerator) ?? [];
      group.push(shortcut);
      byAccelerator.set(accelerator, group);
    }
  }
  for (const [accelerator, group] of byAccelerator) {
    if (group.length < 2) {
      byAccelerator.delete(accelerator);
    }
  }
  return byAccelerator;
};
