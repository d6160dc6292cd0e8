import { Effect, Layer, Option } from "effect";

import type { Profile } from "../../src/model/profile";
import { ProfileIoError, ProfileNotFoundError } from "../../src/profiles/errors";
import { ProfileStore } from "../../src/profiles/store";

/** Profile store over a map keyed by name; saved profiles land under `/mem`. */
export function memoryProfileStore(initial: ReadonlyArray<Profile> = []) {
  const profiles = new Map(initial.map((profile) => [profile.name, profile] as const));

  const unsupported = (path: string) =>
    Effect.fail(
      new ProfileIoError({ path, operation: "read", message: "files are not available in memory" }),
    );

  const layer = Layer.succeed(
    ProfileStore,
    ProfileStore.of({
      list: () => Effect.sync(() => [...profiles.values()]),
      get: (name) => Effect.sync(() => Option.fromNullable(profiles.get(name))),
      save: (profile) =>
        Effect.sync(() => {
          profiles.set(profile.name, profile);
          return `/mem/${profile.name}.toml`;
        }),
      delete: (name) =>
        Effect.suspend((): Effect.Effect<void, ProfileNotFoundError> =>
          profiles.delete(name)
            ? Effect.void
            : Effect.fail(new ProfileNotFoundError({ name, message: `No profile named ${name}` })),
        ),
      load: unsupported,
      write: () => Effect.void,
      import: unsupported,
      export: () => Effect.void,
    }),
  );

  return { layer, profiles };
}
