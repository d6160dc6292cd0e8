import { Effect, Either } from "effect";
import { describe, expect, test } from "vitest";

import { makeProfile } from "../src/model/profile";
import { decodeProfile, encodeProfile } from "../src/profiles/format";

const NOW = new Date("2026-04-01T12:00:00.000Z");

const decode = (text: string) =>
  Effect.runPromise(Effect.either(decodeProfile(text, "/profiles/work.toml", "work", NOW)));

const TEXT = `
[profile]
name = "daily"
description = "Daily setup"
version = 2
created = 2026-02-01T08:30:00Z
modified = "2026-02-02T09:00:00.000Z"

[shortcuts]
"org.gnome.desktop.wm.keybindings.close" = ["<Super>q"]
"org.gnome.desktop.wm.keybindings.minimize" = []

[xkb]
caps_lock = "caps:escape"

[mac_keyboard]
fn_mode = "sideways"
swap_opt_cmd = true

[metadata]
preset = true
`;

describe("decodeProfile", () => {
  test("reads every section", async () => {
    const result = await decode(TEXT);
    if (Either.isLeft(result)) {
      throw new Error(result.left.message);
    }
    const profile = result.right;
    expect(profile.name).toBe("daily");
    expect(profile.description).toBe("Daily setup");
    expect(profile.version).toBe("2");
    expect(profile.created.toISOString()).toBe("2026-02-01T08:30:00.000Z");
    expect(profile.modified.toISOString()).toBe("2026-02-02T09:00:00.000Z");
    expect(profile.shortcuts).toEqual({
      "org.gnome.desktop.wm.keybindings.close": ["<Super>q"],
      "org.gnome.desktop.wm.keybindings.minimize": [],
    });
    expect(profile.xkb).toEqual({ capsLock: "caps:escape" });
    expect(profile.macKeyboard).toEqual({
      fnMode: "media",
      swapOptCmd: true,
      swapFnLeftCtrl: false,
      isoLayout: false,
    });
    expect(profile.metadata).toEqual({ preset: true });
  });

  test("fills an empty document from the file name", async () => {
    const result = await decode("");
    expect(Either.isRight(result)).toBe(true);
    if (Either.isRight(result)) {
      expect(result.right.name).toBe("work");
      expect(result.right.version).toBe("1.0");
      expect(result.right.created).toEqual(NOW);
      expect(result.right.shortcuts).toEqual({});
      expect(result.right.macKeyboard).toBeUndefined();
    }
  });

  test("rejects broken TOML", async () => {
    const result = await decode("[profile");
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ProfileFormatError");
      expect(result.left.path).toBe("/profiles/work.toml");
    }
  });

  test("rejects shortcuts that are not lists", async () => {
    const result = await decode('[shortcuts]\n"org.gnome.shell.keybindings.toggle-overview" = "<Super>s"\n');
    expect(Either.isLeft(result)).toBe(true);
  });
});

describe("encodeProfile", () => {
  test("writes a document that reads back", async () => {
    const profile = makeProfile(
      {
        name: "laptop",
        author: "test-user",
        shortcuts: { "org.gnome.desktop.wm.keybindings.close": ["<Super>q", "<Super>w"] },
        macKeyboard: { fnMode: "fkeys", swapOptCmd: false, swapFnLeftCtrl: true, isoLayout: true },
        metadata: { base_preset: "tiling" },
      },
      NOW,
    );
    const text = encodeProfile(profile);
    const result = await Effect.runPromise(decodeProfile(text, "mem", "fallback", new Date(0)));

    expect(result).toEqual(profile);
  });

  test("omits empty optional sections", () => {
    const text = encodeProfile(makeProfile({ name: "bare" }, NOW));
    expect(text).not.toContain("[xkb]");
    expect(text).not.toContain("[mac_keyboard]");
    expect(text).not.toContain("[metadata]");
    expect(text).toContain('created = "2026-04-01T12:00:00.000Z"');
  });
});
