import * as Path from "node:path";

import { FileSystem } from "@effect/platform";
import { Clock, Context, Effect, Layer, Option } from "effect";

import { profileStoreConfig } from "../config";
import type { Profile } from "../model/profile";

import { ProfileIoError, ProfileNotFoundError } from "./errors";
import type { ProfileFormatError } from "./errors";
import { decodeProfile, encodeProfile } from "./format";

export const PROFILE_EXTENSION = ".toml";

export const profileFileName = (name: string): string => `${name}${PROFILE_EXTENSION}`;

const stemOf = (path: string): string => Path.basename(path, PROFILE_EXTENSION);

export interface ProfileStoreShape {
  /** User profiles first, then bundled presets; each half sorted by file name. */
  readonly list: () => Effect.Effect<Array<Profile>, ProfileIoError>;
  /** A user profile shadows a preset of the same name. */
  readonly get: (name: string) => Effect.Effect<Option.Option<Profile>, ProfileIoError>;
  /** Writes `<name>.toml` in the user directory with a fresh `modified` stamp. */
  readonly save: (profile: Profile) => Effect.Effect<string, ProfileIoError>;
  readonly delete: (name: string) => Effect.Effect<void, ProfileIoError | ProfileNotFoundError>;
  readonly load: (path: string) => Effect.Effect<Profile, ProfileIoError | ProfileFormatError>;
  readonly write: (profile: Profile, path: string) => Effect.Effect<void, ProfileIoError>;
  /** Copies an external file into the user directory, returning the stored profile. */
  readonly import: (
    path: string,
  ) => Effect.Effect<Profile, ProfileIoError | ProfileFormatError>;
  readonly export: (
    name: string,
    path: string,
  ) => Effect.Effect<void, ProfileIoError | ProfileNotFoundError>;
}

export class ProfileStore extends Context.Tag("@keysync/ProfileStore")<
  ProfileStore,
  ProfileStoreShape
>() {}

export const makeProfileStore = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const { profilesDir, presetsDir } = yield* profileStoreConfig;

  const ioError =
    (path: string, operation: ProfileIoError["operation"]) =>
    (cause: unknown): ProfileIoError =>
      new ProfileIoError({ path, operation, message: `Failed to ${operation} ${path}`, cause });

  const load = Effect.fn("ProfileStore.load")(function* (path: string) {
    const text = yield* fs.readFileString(path).pipe(Effect.mapError(ioError(path, "read")));
    const now = new Date(yield* Clock.currentTimeMillis);
    return yield* decodeProfile(text, path, stemOf(path), now);
  });

  const write = Effect.fn("ProfileStore.write")(function* (profile: Profile, path: string) {
    yield* fs
      .makeDirectory(Path.dirname(path), { recursive: true })
      .pipe(Effect.mapError(ioError(path, "write")));
    yield* fs.writeFileString(path, encodeProfile(profile)).pipe(Effect.mapError(ioError(path, "write")));
  });

  const filesIn = Effect.fn("ProfileStore.filesIn")(function* (directory: string) {
    const exists = yield* fs.exists(directory).pipe(Effect.mapError(ioError(directory, "list")));
    if (!exists) {
      return [];
    }
    const entries = yield* fs
      .readDirectory(directory)
      .pipe(Effect.mapError(ioError(directory, "list")));
    return entries
      .filter((entry) => entry.endsWith(PROFILE_EXTENSION))
      .sort()
      .map((entry) => Path.join(directory, entry));
  });

  const loadValid = (path: string) =>
    load(path).pipe(
      Effect.map(Option.some),
      Effect.catchAll((error) =>
        Effect.logWarning("Skipping unreadable profile", { path, error: error.message }).pipe(
          Effect.as(Option.none<Profile>()),
        ),
      ),
    );

  const list = Effect.fn("ProfileStore.list")(function* () {
    const paths = [...(yield* filesIn(profilesDir)), ...(yield* filesIn(presetsDir))];
    const loaded = yield* Effect.forEach(paths, loadValid);
    return loaded.flatMap((profile) => (Option.isSome(profile) ? [profile.value] : []));
  });

  const get = Effect.fn("ProfileStore.get")(function* (name: string) {
    for (const directory of [profilesDir, presetsDir]) {
      const path = Path.join(directory, profileFileName(name));
      const exists = yield* fs.exists(path).pipe(Effect.mapError(ioError(path, "read")));
      if (exists) {
        return yield* loadValid(path);
      }
    }
    return Option.none<Profile>();
  });

  const save = Effect.fn("ProfileStore.save")(function* (profile: Profile) {
    const path = Path.join(profilesDir, profileFileName(profile.name));
    const modified = new Date(yield* Clock.currentTimeMillis);
    yield* write({ ...profile, modified }, path);
    yield* Effect.logInfo("Saved profile", { name: profile.name, path });
    return path;
  });

  const remove = Effect.fn("ProfileStore.delete")(function* (name: string) {
    const path = Path.join(profilesDir, profileFileName(name));
    const exists = yield* fs.exists(path).pipe(Effect.mapError(ioError(path, "delete")));
    if (!exists) {
      return yield* new ProfileNotFoundError({
        name,
        message: `No user profile named ${name}`,
      });
    }
    yield* fs.remove(path).pipe(Effect.mapError(ioError(path, "delete")));
  });

  const importProfile = Effect.fn("ProfileStore.import")(function* (path: string) {
    const profile = yield* load(path);
    yield* save(profile);
    return profile;
  });

  const exportProfile = Effect.fn("ProfileStore.export")(function* (name: string, path: string) {
    const profile = yield* get(name);
    if (Option.isNone(profile)) {
      return yield* new ProfileNotFoundError({ name, message: `No profile named ${name}` });
    }
    yield* write(profile.value, path);
  });

  return ProfileStore.of({
    list,
    get,
    save,
    delete: remove,
    load,
    write,
    import: importProfile,
    export: exportProfile,
  });
});

export const ProfileStoreLive = Layer.effect(ProfileStore, makeProfileStore);
