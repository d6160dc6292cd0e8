import { ConfigProvider, Effect } from "effect";
import { describe, expect, test } from "vitest";

import { KeyboardHardware, keyboardTypeFor, suggestKeyboardType } from "../src/hardware/keyboard";

const suggest = (env: Record<string, string>) =>
  Effect.runPromise(
    suggestKeyboardType().pipe(
      Effect.provide(KeyboardHardware.FromConfig),
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
    ),
  );

describe("keyboardTypeFor", () => {
  test("prefers the apple layout", () => {
    expect(keyboardTypeFor(true, true)).toBe("mac-ansi");
    expect(keyboardTypeFor(false, true)).toBe("ansi-104");
    expect(keyboardTypeFor(false, false)).toBe("ansi-87");
  });
});

describe("suggestKeyboardType", () => {
  test("reads the hardware flags from config", async () => {
    expect(await suggest({ KEYSYNC_KEYBOARD_NUMPAD: "true" })).toBe("ansi-104");
    expect(await suggest({ KEYSYNC_KEYBOARD_APPLE: "true" })).toBe("mac-ansi");
  });

  test("assumes a tenkeyless board without flags", async () => {
    expect(await suggest({})).toBe("ansi-87");
  });
});
