import { Command } from "@effect/platform";
import { CommandExecutor } from "@effect/platform/CommandExecutor";
import { Context, Effect, Layer, Option } from "effect";

/** Read-only view of the applications installed on this machine. */
export class AppLocator extends Context.Tag("@keysync/AppLocator")<
  AppLocator,
  {
    readonly hasBinary: (name: string) => Effect.Effect<boolean>;
    /** Trimmed standard output, or none when the command is missing, fails or prints nothing. */
    readonly output: (
      command: string,
      args: ReadonlyArray<string>,
    ) => Effect.Effect<Option.Option<string>>;
  }
>() {
  static readonly Live = Layer.effect(
    AppLocator,
    Effect.gen(function* () {
      const executor = yield* CommandExecutor;

      const output = (command: string, args: ReadonlyArray<string>) =>
        executor.string(Command.make(command, ...args)).pipe(
          Effect.timeout("5 seconds"),
          Effect.map((text) => Option.some(text.trim()).pipe(Option.filter((line) => line !== ""))),
          Effect.catchAll((error) =>
            Effect.logDebug("App query failed", { command, args, error: error.message }).pipe(
              Effect.as(Option.none<string>()),
            ),
          ),
        );

      return AppLocator.of({
        hasBinary: (name) => output("which", [name]).pipe(Effect.map(Option.isSome)),
        output,
      });
    }),
  );
}
