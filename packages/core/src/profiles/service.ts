import { Clock, Context, Effect, Equal, Layer, Option, Ref } from "effect";

import { formatAccelerator, parseAccelerators, sameAccelerators } from "../accelerator/codec";
import { ShortcutsBackend } from "../backend/backend";
import type { NativeStoreError } from "../backend/errors";
import { MacKeyboardConfigurator } from "../hardware/mac";
import type { KeyBinding } from "../model/binding";
import {
  isPreset,
  makeProfile,
  type Profile,
  profileShortcut,
  PROFILE_TYPE_USER_MODIFICATIONS,
  withShortcut,
} from "../model/profile";
import type { Shortcut } from "../model/shortcut";

import type { ProfileIoError } from "./errors";
import { ProfileStore } from "./store";

/** Live accelerators next to the ones a profile or default expects. */
export interface AcceleratorDelta {
  readonly current: ReadonlyArray<string>;
  readonly expected: ReadonlyArray<string>;
}

export interface ApplyOptions {
  /** Disable every other shortcut first. Defaults to the profile's preset flag. */
  readonly cleanSlate?: boolean;
}

export interface ModificationsExport {
  readonly path: Option.Option<string>;
  readonly count: number;
}

export interface ModificationsProfileOptions {
  readonly name?: string;
  readonly description?: string;
}

export interface ProfileServiceShape {
  readonly apply: (
    profile: Profile,
    options?: ApplyOptions,
  ) => Effect.Effect<Map<string, Shortcut>, NativeStoreError>;
  readonly diff: (profile: Profile) => Effect.Effect<Map<string, AcceleratorDelta>, NativeStoreError>;
  readonly resetOrphanedShortcuts: (
    previous: Profile,
    next: Profile,
  ) => Effect.Effect<number, NativeStoreError>;
  readonly userModifications: (
    base: Profile,
  ) => Effect.Effect<Map<string, AcceleratorDelta>, NativeStoreError>;
  /** Empty when no profile named `baseName` exists. */
  readonly getUserModifications: (
    baseName: string,
  ) => Effect.Effect<Map<string, AcceleratorDelta>, NativeStoreError | ProfileIoError>;
  readonly createFromCurrent: (
    name: string,
    description?: string,
  ) => Effect.Effect<Profile, NativeStoreError>;
  readonly createModificationsProfile: (
    baseName: string,
    options?: ModificationsProfileOptions,
  ) => Effect.Effect<Option.Option<Profile>, NativeStoreError | ProfileIoError>;
  readonly exportAndClearModifications: (
    baseName: string,
  ) => Effect.Effect<ModificationsExport, NativeStoreError | ProfileIoError>;
  /** The profile most recently passed to `apply` in this process. */
  readonly activeProfile: () => Effect.Effect<Option.Option<Profile>>;
}

export class ProfileService extends Context.Tag("@keysync/ProfileService")<
  ProfileService,
  ProfileServiceShape
>() {}

const pad = (value: number): string => String(value).padStart(2, "0");

/** Local `YYYYMMDD-HHMMSS`. */
export const timestampSuffix = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const modificationsProfileName = (baseName: string, date: Date): string =>
  `user-mods-${baseName}-${timestampSuffix(date)}`;

/**
 * The bindings a shortcut would hold after taking `accelerators`: parsed,
 * deduplicated and, for single-binding shortcuts, cut to the first.
 */
export function targetBindings(
  shortcut: Shortcut,
  accelerators: ReadonlyArray<string>,
): Array<KeyBinding> {
  const unique: Array<KeyBinding> = [];
  for (const binding of parseAccelerators(accelerators)) {
    if (!unique.some((existing) => Equal.equals(existing, binding))) {
      unique.push(binding);
    }
  }
  return shortcut.allowMultiple ? unique : unique.slice(0, 1);
}

const matchesTarget = (shortcut: Shortcut, accelerators: ReadonlyArray<string>): boolean =>
  sameAccelerators(
    shortcut.accelerators,
    targetBindings(shortcut, accelerators).map(formatAccelerator),
  );

// Profiles never address launchers: their storage keys are adapter-assigned paths
const byStorageKey = (shortcuts: Map<string, Shortcut>): Map<string, Shortcut> => {
  const index = new Map<string, Shortcut>();
  for (const shortcut of shortcuts.values()) {
    if (!shortcut.isCustom) {
      index.set(shortcut.storageKey, shortcut);
    }
  }
  return index;
};

export const makeProfileService = Effect.gen(function* () {
  const backend = yield* ShortcutsBackend;
  const store = yield* ProfileStore;
  const active = yield* Ref.make(Option.none<Profile>());

  // Failures of a single write are partial success, not a failed apply
  const saveBindings = (shortcut: Shortcut, bindings: ReadonlyArray<KeyBinding>) => {
    const previous = shortcut.bindings;
    shortcut.setBindings(bindings);
    return backend.saveShortcut(shortcut).pipe(
      Effect.catchAll((error) =>
        Effect.logError("Failed to save shortcut", { id: shortcut.id, error: error.message }).pipe(
          Effect.as(false),
        ),
      ),
      Effect.tap((saved) =>
        Effect.sync(() => {
          if (!saved) {
            shortcut.setBindings(previous);
          }
        }),
      ),
    );
  };

  const resetToNative = (shortcut: Shortcut) =>
    backend.resetShortcut(shortcut).pipe(
      Effect.catchAll((error) =>
        Effect.logError("Failed to reset shortcut", { id: shortcut.id, error: error.message }).pipe(
          Effect.as(false),
        ),
      ),
    );

  const configureMacKeyboard = Effect.fn("ProfileService.configureMacKeyboard")(function* (
    profile: Profile,
  ) {
    if (profile.macKeyboard === undefined) {
      return;
    }
    const configurator = yield* Effect.serviceOption(MacKeyboardConfigurator);
    if (Option.isNone(configurator)) {
      yield* Effect.logDebug("No keyboard configurator; skipping mac_keyboard section");
      return;
    }
    yield* configurator.value
      .apply(profile.macKeyboard)
      .pipe(
        Effect.catchAll((error) =>
          Effect.logWarning("Failed to configure keyboard", { error: error.message }),
        ),
      );
  });

  const apply = Effect.fn("ProfileService.apply")(function* (
    profile: Profile,
    options?: ApplyOptions,
  ) {
    const cleanSlate = options?.cleanSlate ?? isPreset(profile);
    const shortcuts = yield* backend.loadAllShortcuts();
    const index = byStorageKey(shortcuts);
    const changed = new Map<string, Shortcut>();

    if (cleanSlate) {
      for (const shortcut of index.values()) {
        if (shortcut.bindings.length === 0) {
          continue;
        }
        // Already at the profile's value: phase two would only put it back
        const wanted = profileShortcut(profile, shortcut.location);
        if (wanted !== undefined && matchesTarget(shortcut, wanted)) {
          continue;
        }
        if (yield* saveBindings(shortcut, [])) {
          changed.set(shortcut.id, shortcut);
        }
      }
    }

    for (const [storageKey, accelerators] of Object.entries(profile.shortcuts)) {
      const shortcut = index.get(storageKey);
      if (shortcut === undefined) {
        yield* Effect.logDebug("Profile entry has no live shortcut", { storageKey });
        continue;
      }
      if (matchesTarget(shortcut, accelerators)) {
        continue;
      }
      if (yield* saveBindings(shortcut, targetBindings(shortcut, accelerators))) {
        changed.set(shortcut.id, shortcut);
      }
    }

    yield* Ref.set(active, Option.some(profile));
    yield* configureMacKeyboard(profile);
    yield* Effect.logInfo("Applied profile", {
      name: profile.name,
      cleanSlate,
      changed: changed.size,
    });
    return changed;
  });

  const diff = Effect.fn("ProfileService.diff")(function* (profile: Profile) {
    const index = byStorageKey(yield* backend.loadAllShortcuts());
    const deltas = new Map<string, AcceleratorDelta>();
    for (const [storageKey, accelerators] of Object.entries(profile.shortcuts)) {
      const shortcut = index.get(storageKey);
      if (shortcut !== undefined && !matchesTarget(shortcut, accelerators)) {
        deltas.set(shortcut.id, { current: shortcut.accelerators, expected: [...accelerators] });
      }
    }
    return deltas;
  });

  const resetOrphanedShortcuts = Effect.fn("ProfileService.resetOrphanedShortcuts")(function* (
    previous: Profile,
    next: Profile,
  ) {
    const orphaned = Object.keys(previous.shortcuts).filter(
      (storageKey) => !Object.hasOwn(next.shortcuts, storageKey),
    );
    if (orphaned.length === 0) {
      return 0;
    }
    const index = byStorageKey(yield* backend.loadAllShortcuts());
    let count = 0;
    for (const storageKey of orphaned) {
      const shortcut = index.get(storageKey);
      if (shortcut !== undefined && shortcut.isModified && (yield* resetToNative(shortcut))) {
        count += 1;
      }
    }
    yield* Effect.logInfo("Reset orphaned shortcuts", { from: previous.name, to: next.name, count });
    return count;
  });

  const modificationsOf = (base: Profile, shortcuts: Map<string, Shortcut>) => {
    const found: Array<{ readonly shortcut: Shortcut; readonly delta: AcceleratorDelta }> = [];
    for (const shortcut of byStorageKey(shortcuts).values()) {
      const wanted = profileShortcut(base, shortcut.location);
      if (wanted !== undefined) {
        if (!matchesTarget(shortcut, wanted)) {
          const expected = targetBindings(shortcut, wanted).map(formatAccelerator);
          found.push({ shortcut, delta: { current: shortcut.accelerators, expected } });
        }
      } else if (shortcut.isModified) {
        found.push({
          shortcut,
          delta: { current: shortcut.accelerators, expected: shortcut.defaultAccelerators },
        });
      }
    }
    return found;
  };

  const userModifications = Effect.fn("ProfileService.userModifications")(function* (
    base: Profile,
  ) {
    const shortcuts = yield* backend.loadAllShortcuts();
    return new Map(
      modificationsOf(base, shortcuts).map(({ shortcut, delta }) => [shortcut.id, delta] as const),
    );
  });

  const getUserModifications = Effect.fn("ProfileService.getUserModifications")(function* (
    baseName: string,
  ) {
    const base = yield* store.get(baseName);
    if (Option.isNone(base)) {
      yield* Effect.logWarning("Base profile not found", { name: baseName });
      return new Map<string, AcceleratorDelta>();
    }
    return yield* userModifications(base.value);
  });

  const createFromCurrent = Effect.fn("ProfileService.createFromCurrent")(function* (
    name: string,
    description?: string,
  ) {
    const shortcuts = yield* backend.loadAllShortcuts();
    const now = new Date(yield* Clock.currentTimeMillis);
    let profile = makeProfile({ name, description: description ?? "" }, now);
    for (const shortcut of byStorageKey(shortcuts).values()) {
      if (shortcut.bindings.length > 0) {
        profile = withShortcut(profile, shortcut.location, shortcut.accelerators);
      }
    }
    return profile;
  });

  const buildModificationsProfile = Effect.fn("ProfileService.buildModificationsProfile")(
    function* (
      baseName: string,
      modifications: ReadonlyArray<{ readonly shortcut: Shortcut; readonly delta: AcceleratorDelta }>,
      options?: ModificationsProfileOptions,
    ) {
      const now = new Date(yield* Clock.currentTimeMillis);
      let profile = makeProfile(
        {
          name: options?.name || modificationsProfileName(baseName, now),
          description: options?.description || `User modifications from ${baseName} preset`,
          metadata: { base_preset: baseName, type: PROFILE_TYPE_USER_MODIFICATIONS },
        },
        now,
      );
      for (const { shortcut, delta } of modifications) {
        profile = withShortcut(profile, shortcut.location, delta.current);
      }
      return profile;
    },
  );

  const createModificationsProfile = Effect.fn("ProfileService.createModificationsProfile")(
    function* (baseName: string, options?: ModificationsProfileOptions) {
      const base = yield* store.get(baseName);
      if (Option.isNone(base)) {
        return Option.none<Profile>();
      }
      const modifications = modificationsOf(base.value, yield* backend.loadAllShortcuts());
      if (modifications.length === 0) {
        return Option.none<Profile>();
      }
      return Option.some(yield* buildModificationsProfile(baseName, modifications, options));
    },
  );

  const exportAndClearModifications = Effect.fn("ProfileService.exportAndClearModifications")(
    function* (baseName: string) {
      const base = yield* store.get(baseName);
      if (Option.isNone(base)) {
        yield* Effect.logWarning("Base profile not found", { name: baseName });
        return { path: Option.none<string>(), count: 0 };
      }
      const modifications = modificationsOf(base.value, yield* backend.loadAllShortcuts());
      if (modifications.length === 0) {
        return { path: Option.none<string>(), count: 0 };
      }

      const exported = yield* buildModificationsProfile(baseName, modifications, {
        description: `User modifications exported from ${baseName} preset`,
      });
      const path = yield* store.save(exported);

      for (const { shortcut } of modifications) {
        if (!Object.hasOwn(base.value.shortcuts, shortcut.storageKey)) {
          yield* resetToNative(shortcut);
        }
      }
      yield* apply(base.value);

      return { path: Option.some(path), count: Object.keys(exported.shortcuts).length };
    },
  );

  return ProfileService.of({
    apply,
    diff,
    resetOrphanedShortcuts,
    userModifications,
    getUserModifications,
    createFromCurrent,
    createModificationsProfile,
    exportAndClearModifications,
    activeProfile: () => Ref.get(active),
  });
});

export const ProfileServiceLive = Layer.effect(ProfileService, makeProfileService);
