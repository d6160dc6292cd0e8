import { Effect, Layer } from "effect";

import { ShortcutDaemon } from "../../src/kde/daemon";

export function recordingDaemon() {
  let reloads = 0;
  const layer = Layer.succeed(
    ShortcutDaemon,
    ShortcutDaemon.of({
      reload: () =>
        Effect.sync(() => {
          reloads += 1;
        }),
    }),
  );
  return { layer, reloads: () => reloads };
}
