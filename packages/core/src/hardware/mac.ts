import { Context, type Effect, Schema } from "effect";

import type { MacKeyboardConfig } from "../model/keyboard";

export class HardwareConfigError extends Schema.TaggedError<HardwareConfigError>()(
  "HardwareConfigError",
  {
    message: Schema.String,
    cause: Schema.optional(Schema.Defect),
  },
) {}

/**
 * Sink for the Apple keyboard driver options a profile carries. Optional: when
 * no implementation is provided, profiles apply without touching hardware.
 */
export class MacKeyboardConfigurator extends Context.Tag("@keysync/MacKeyboardConfigurator")<
  MacKeyboardConfigurator,
  {
    readonly apply: (config: MacKeyboardConfig) => Effect.Effect<void, HardwareConfigError>;
  }
>() {}
