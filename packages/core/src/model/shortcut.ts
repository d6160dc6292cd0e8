import { Equal, HashSet } from "effect";

import { formatAccelerator, humanizeAccelerator } from "../accelerator/codec";

import type { KeyBinding } from "./binding";
import { CUSTOM_CATEGORY_ID } from "./category";

/**
 * Where a shortcut lives in its native store. Only the owning adapter gives the
 * two parts meaning: schema and key, INI section and entry, or a launcher path.
 */
export interface NativeLocation {
  readonly container: string;
  readonly key: string;
}

export interface ShortcutInit {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly category: string;
  readonly group?: string;
  readonly location: NativeLocation;
  readonly bindings?: ReadonlyArray<KeyBinding>;
  readonly defaultBindings?: ReadonlyArray<KeyBinding>;
  readonly allowMultiple?: boolean;
  readonly system?: boolean;
}

export const storageKeyOf = (location: NativeLocation): string =>
  `${location.container}.${location.key}`;

export class Shortcut {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly category: string;
  readonly group: string;
  readonly location: NativeLocation;
  readonly defaultBindings: ReadonlyArray<KeyBinding>;
  readonly allowMultiple: boolean;
  readonly system: boolean;
  #bindings: Array<KeyBinding> = [];

  constructor(init: ShortcutInit) {
    this.id = init.id;
    this.name = init.name;
    this.description = init.description ?? "";
    this.category = init.category;
    this.group = init.group ?? "";
    this.location = init.location;
    this.allowMultiple = init.allowMultiple ?? true;
    this.system = init.system ?? false;
    this.defaultBindings = [...(init.defaultBindings ?? [])];
    this.setBindings(init.bindings ?? []);
  }

  get bindings(): ReadonlyArray<KeyBinding> {
    return this.#bindings;
  }

  get storageKey(): string {
    return storageKeyOf(this.location);
  }

  get isCustom(): boolean {
    return this.category === CUSTOM_CATEGORY_ID;
  }

  get accelerators(): Array<string> {
    return this.#bindings.map(formatAccelerator);
  }

  get defaultAccelerators(): Array<string> {
    return this.defaultBindings.map(formatAccelerator);
  }

  /** Primary accelerator, or the empty string when unbound. */
  get accelerator(): string {
    const primary = this.#bindings[0];
    return primary === undefined ? "" : formatAccelerator(primary);
  }

  get label(): string {
    return this.#bindings.map(humanizeAccelerator).join(" / ");
  }

  get isModified(): boolean {
    return !Equal.equals(
      HashSet.fromIterable(this.#bindings),
      HashSet.fromIterable(this.defaultBindings),
    );
  }

  /** Replaces the bindings; single-binding shortcuts keep only the first. */
  setBindings(bindings: ReadonlyArray<KeyBinding>): void {
    const unique: Array<KeyBinding> = [];
    for (const binding of bindings) {
      if (!unique.some((existing) => Equal.equals(existing, binding))) {
        unique.push(binding);
      }
    }
    this.#bindings = this.allowMultiple ? unique : unique.slice(0, 1);
  }

  addBinding(binding: KeyBinding): void {
    if (!this.allowMultiple) {
      this.#bindings = [binding];
      return;
    }
    if (!this.hasBinding(binding)) {
      this.#bindings = [...this.#bindings, binding];
    }
  }

  removeBinding(binding: KeyBinding): void {
    this.#bindings = this.#bindings.filter((existing) => !Equal.equals(existing, binding));
  }

  clear(): void {
    this.#bindings = [];
  }

  resetToDefault(): void {
    this.setBindings(this.defaultBindings);
  }

  hasBinding(binding: KeyBinding): boolean {
    return this.#bindings.some((existing) => Equal.equals(existing, binding));
  }

  conflictsWith(other: Shortcut): boolean {
    return other.id !== this.id && this.#bindings.some((binding) => other.hasBinding(binding));
  }
}

/** A user-defined launcher as stored by an adapter. */
export interface CustomKeybinding {
  readonly path: string;
  readonly name: string;
  readonly command: string;
  readonly binding: string;
}

export interface CustomKeybindingPatch {
  readonly name?: string;
  readonly command?: string;
  readonly binding?: string;
}
