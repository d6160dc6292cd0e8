import { Command } from "@effect/platform";
import { CommandExecutor } from "@effect/platform/CommandExecutor";
import { Context, Effect, Layer } from "effect";

/** Tells the running shortcut daemon to re-read its configuration. Never fails. */
export class ShortcutDaemon extends Context.Tag("@keysync/ShortcutDaemon")<
  ShortcutDaemon,
  {
    readonly reload: () => Effect.Effect<void>;
  }
>() {
  static readonly Live = Layer.effect(
    ShortcutDaemon,
    Effect.gen(function* () {
      const executor = yield* CommandExecutor;

      const reload = () =>
        executor.exitCode(Command.make("qdbus", "org.kde.KWin", "/KWin", "reconfigure")).pipe(
          Effect.timeout("5 seconds"),
          Effect.flatMap((code) =>
            code === 0 ? Effect.void : Effect.logDebug("Shortcut daemon reload exited", { code }),
          ),
          Effect.catchAll((error) =>
            Effect.logDebug("Shortcut daemon is unreachable", { error: String(error) }),
          ),
        );

      return ShortcutDaemon.of({ reload });
    }),
  );
}
