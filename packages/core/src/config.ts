import { fileURLToPath } from "node:url";

import { Config } from "effect";

export const BUNDLED_PRESETS_DIR = fileURLToPath(new URL("../presets", import.meta.url));

const nonEmpty = (name: string) =>
  Config.string(name).pipe(
    Config.validate({ message: `${name} is empty`, validation: (value) => value.length > 0 }),
  );

export const configHome = nonEmpty("XDG_CONFIG_HOME").pipe(
  Config.orElse(() => nonEmpty("HOME").pipe(Config.map((home) => `${home}/.config`))),
);

export const kglobalshortcutsPath = nonEmpty("KGLOBALSHORTCUTSRC").pipe(
  Config.orElse(() => configHome.pipe(Config.map((dir) => `${dir}/kglobalshortcutsrc`))),
);

export const profileStoreConfig = Config.all({
  profilesDir: nonEmpty("KEYSYNC_PROFILES_DIR").pipe(
    Config.orElse(() => configHome.pipe(Config.map((dir) => `${dir}/keysync/profiles`))),
  ),
  presetsDir: nonEmpty("KEYSYNC_PRESETS_DIR").pipe(Config.withDefault(BUNDLED_PRESETS_DIR)),
});
