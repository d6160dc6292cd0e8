import { Command } from "@effect/platform";
import { CommandExecutor } from "@effect/platform/CommandExecutor";
import { Context, Effect, Layer } from "effect";

import { NativeStoreError } from "../backend/errors";

import { formatGVariant, type GVariant, parseGVariant } from "./gvariant";

export interface GSettingsKey {
  readonly key: string;
  readonly value: GVariant;
  readonly defaultValue: GVariant;
}

/** Addresses a relocatable schema instance, as `gsettings` does. */
export const relocatable = (schema: string, path: string): string => `${schema}:${path}`;

/**
 * Port onto the schema-described key-value store. Schema ids passed to `get`,
 * `set` and `reset` may be relocatable addresses built with {@link relocatable}.
 */
export class GSettingsClient extends Context.Tag("@keysync/GSettingsClient")<
  GSettingsClient,
  {
    readonly listSchemas: () => Effect.Effect<ReadonlySet<string>, NativeStoreError>;
    readonly listKeys: (schema: string) => Effect.Effect<ReadonlyArray<GSettingsKey>, NativeStoreError>;
    readonly describe: (schema: string, key: string) => Effect.Effect<string, NativeStoreError>;
    readonly get: (schema: string, key: string) => Effect.Effect<GVariant, NativeStoreError>;
    readonly set: (
      schema: string,
      key: string,
      value: GVariant,
    ) => Effect.Effect<void, NativeStoreError>;
    readonly reset: (schema: string, key: string) => Effect.Effect<void, NativeStoreError>;
  }
>() {
  static readonly Live = Layer.effect(
    GSettingsClient,
    Effect.gen(function* () {
      const executor = yield* CommandExecutor;

      const failure = (operation: string, message: string, cause?: unknown) =>
        new NativeStoreError({ store: "gsettings", operation, message, cause });

      const output = (operation: string, command: Command.Command) =>
        executor
          .string(command)
          .pipe(
            Effect.mapError((cause) =>
              failure(operation, `gsettings ${operation} could not run`, cause),
            ),
          );

      const succeed = (operation: string, args: ReadonlyArray<string>) =>
        executor.exitCode(Command.make("gsettings", ...args)).pipe(
          Effect.mapError((cause) =>
            failure(operation, `gsettings ${operation} could not run`, cause),
          ),
          Effect.flatMap((code) =>
            code === 0
              ? Effect.void
              : Effect.fail(failure(operation, `gsettings ${args.join(" ")} exited with ${code}`)),
          ),
        );

      // `schema key value`, where the value may itself contain spaces
      const parseListing = (schema: string, listing: string) => {
        const values = new Map<string, GVariant>();
        for (const line of listing.split("\n")) {
          const first = line.indexOf(" ");
          const second = line.indexOf(" ", first + 1);
          if (first < 0 || second < 0 || line.slice(0, first) !== schema) {
            continue;
          }
          values.set(line.slice(first + 1, second), parseGVariant(line.slice(second + 1)));
        }
        return values;
      };

      const listSchemas = Effect.fn("GSettingsClient.listSchemas")(function* () {
        const fixed = yield* output("list-schemas", Command.make("gsettings", "list-schemas"));
        const relocatables = yield* output(
          "list-relocatable-schemas",
          Command.make("gsettings", "list-relocatable-schemas"),
        );
        return new Set(
          `${fixed}\n${relocatables}`
            .split("\n")
            .map((line) => line.trim())
            .filter((line) => line.length > 0),
        );
      });

      const listKeys = Effect.fn("GSettingsClient.listKeys")(function* (schema: string) {
        const current = parseListing(
          schema,
          yield* output("list-recursively", Command.make("gsettings", "list-recursively", schema)),
        );
        // The memory backend starts empty, so it reports schema defaults
        const defaults = parseListing(
          schema,
          yield* output(
            "list-recursively",
            Command.make("gsettings", "list-recursively", schema).pipe(
              Command.env({ GSETTINGS_BACKEND: "memory" }),
            ),
          ),
        );

        return [...current].map(([key, value]) => ({
          key,
          value,
          defaultValue: defaults.get(key) ?? value,
        }));
      });

      const describe = (schema: string, key: string) =>
        output("describe", Command.make("gsettings", "describe", schema, key)).pipe(
          Effect.map((text) => text.trim()),
        );

      const get = Effect.fn("GSettingsClient.get")(function* (schema: string, key: string) {
        const text = (yield* output("get", Command.make("gsettings", "get", schema, key))).trim();
        if (text.length === 0) {
          return yield* failure("get", `No value for ${schema} ${key}`);
        }
        return parseGVariant(text);
      });

      return GSettingsClient.of({
        listSchemas,
        listKeys,
        describe,
        get,
        set: (schema, key, value) => succeed("set", ["set", schema, key, formatGVariant(value)]),
        reset: (schema, key) => succeed("reset", ["reset", schema, key]),
      });
    }),
  );
}
