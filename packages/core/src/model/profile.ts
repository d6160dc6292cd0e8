import type { NativeLocation } from "./shortcut";
import { storageKeyOf } from "./shortcut";
import type { MacKeyboardConfig, XkbOptions } from "./keyboard";

/**
 * A named bag of storage-key → accelerator lists. An empty list means the
 * shortcut is explicitly disabled by the profile.
 */
export interface Profile {
  readonly name: string;
  readonly description: string;
  readonly author: string;
  readonly version: string;
  readonly created: Date;
  readonly modified: Date;
  readonly shortcuts: Readonly<Record<string, ReadonlyArray<string>>>;
  readonly xkb: XkbOptions;
  readonly macKeyboard?: MacKeyboardConfig;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface ProfileInit {
  readonly name: string;
  readonly description?: string;
  readonly author?: string;
  readonly version?: string;
  readonly created?: Date;
  readonly modified?: Date;
  readonly shortcuts?: Readonly<Record<string, ReadonlyArray<string>>>;
  readonly xkb?: XkbOptions;
  readonly macKeyboard?: MacKeyboardConfig;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export const PROFILE_TYPE_USER_MODIFICATIONS = "user-modifications";

export function makeProfile(init: ProfileInit, now: Date = new Date()): Profile {
  return {
    name: init.name,
    description: init.description ?? "",
    author: init.author ?? "",
    version: init.version ?? "1.0",
    created: init.created ?? now,
    modified: init.modified ?? now,
    shortcuts: { ...init.shortcuts },
    xkb: init.xkb ?? {},
    ...(init.macKeyboard === undefined ? {} : { macKeyboard: init.macKeyboard }),
    metadata: { ...init.metadata },
  };
}

export const withShortcut = (
  profile: Profile,
  location: NativeLocation,
  accelerators: ReadonlyArray<string>,
): Profile => ({
  ...profile,
  shortcuts: { ...profile.shortcuts, [storageKeyOf(location)]: [...accelerators] },
});

export const profileShortcut = (
  profile: Profile,
  location: NativeLocation,
): ReadonlyArray<string> | undefined => profile.shortcuts[storageKeyOf(location)];

export const isPreset = (profile: Profile): boolean => profile.metadata["preset"] === true;

export const basePresetOf = (profile: Profile): string | undefined => {
  const base = profile.metadata["base_preset"];
  return typeof base === "string" ? base : undefined;
};
