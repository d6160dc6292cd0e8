import { Effect } from "effect";

import { DISABLED, parseAccelerator } from "../accelerator/codec";
import type { KeyBinding } from "../model/binding";

/**
 * Parses accelerators read from a native store. Empty and disabled entries mean
 * "no binding"; anything else that does not parse is dropped with a warning.
 */
export const parseNativeBindings = (
  accelerators: ReadonlyArray<string>,
  source: string,
): Effect.Effect<Array<KeyBinding>> =>
  Effect.gen(function* () {
    const bindings: Array<KeyBinding> = [];
    for (const accelerator of accelerators) {
      if (accelerator === "" || accelerator === DISABLED) {
        continue;
      }
      const binding = parseAccelerator(accelerator);
      if (binding === null) {
        yield* Effect.logWarning("Ignoring unparsable accelerator", { source, accelerator });
        continue;
      }
      bindings.push(binding);
    }
    return bindings;
  });
