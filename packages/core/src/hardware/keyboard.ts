import { Config, Context, Effect, Layer } from "effect";

import type { KeyboardType } from "../model/keyboard";

export interface KeyboardHardwareShape {
  readonly isAppleKeyboard: () => Effect.Effect<boolean>;
  readonly hasNumpad: () => Effect.Effect<boolean>;
}

/** What is known about the attached keyboard. */
export class KeyboardHardware extends Context.Tag("@keysync/KeyboardHardware")<
  KeyboardHardware,
  KeyboardHardwareShape
>() {
  /** Reads `KEYSYNC_KEYBOARD_APPLE` and `KEYSYNC_KEYBOARD_NUMPAD`. */
  static readonly FromConfig = Layer.effect(
    KeyboardHardware,
    Effect.gen(function* () {
      const apple = yield* Config.boolean("KEYSYNC_KEYBOARD_APPLE").pipe(
        Config.withDefault(false),
      );
      const numpad = yield* Config.boolean("KEYSYNC_KEYBOARD_NUMPAD").pipe(
        Config.withDefault(false),
      );
      return KeyboardHardware.of({
        isAppleKeyboard: () => Effect.succeed(apple),
        hasNumpad: () => Effect.succeed(numpad),
      });
    }),
  );
}

export function keyboardTypeFor(apple: boolean, numpad: boolean): KeyboardType {
  if (apple) {
    return "mac-ansi";
  }
  return numpad ? "ansi-104" : "ansi-87";
}

export const suggestKeyboardType = Effect.fn("KeyboardHardware.suggest")(function* () {
  const hardware = yield* KeyboardHardware;
  return keyboardTypeFor(yield* hardware.isAppleKeyboard(), yield* hardware.hasNumpad());
});
