import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";

import { parseAccelerator } from "../src/accelerator/codec";
import { ShortcutsBackend, type ShortcutsBackendShape } from "../src/backend/backend";
import {
  CUSTOM_BINDING_SCHEMA,
  CUSTOM_LIST_KEY,
  CUSTOM_PATH_PREFIX,
  CUSTOM_SCHEMA,
  customShortcutId,
  GnomeShortcutsBackendLive,
} from "../src/gnome/backend";
import { relocatable } from "../src/gnome/client";
import { Shortcut } from "../src/model/shortcut";

import { fakeGSettings } from "./support/gsettings";

const WM = "org.gnome.desktop.wm.keybindings";
const TERMINAL_PATH = `${CUSTOM_PATH_PREFIX}/custom0/`;

const setup = () => {
  const gsettings = fakeGSettings({
    [WM]: {
      close: ["['<Super>q']", "['<Alt>F4']"],
      minimize: ["['<Super>h']", "['<Super>h']"],
      "switch-to-workspace-1": ["['<Super>Home']", "['<Super>Home']"],
      "num-workspaces": ["4", "4"],
    },
    [CUSTOM_SCHEMA]: {
      screensaver: ["'<Super>l'", "'<Super>l'"],
      [CUSTOM_LIST_KEY]: [`['${TERMINAL_PATH}']`, "@as []"],
    },
  });
  const address = relocatable(CUSTOM_BINDING_SCHEMA, TERMINAL_PATH);
  const run = <A, E>(body: (backend: ShortcutsBackendShape) => Effect.Effect<A, E>) =>
    Effect.runPromise(
      Effect.gen(function* () {
        const backend = yield* ShortcutsBackend;
        return yield* body(backend);
      }).pipe(Effect.provide(GnomeShortcutsBackendLive), Effect.provide(gsettings.layer)),
    );
  return { gsettings, run, address };
};

const seedTerminal = ({ run }: ReturnType<typeof setup>) =>
  run((backend) =>
    backend.updateCustomKeybinding(TERMINAL_PATH, {
      name: "Terminal",
      command: "kgx",
      binding: "<Super>Return",
    }),
  );

describe("GNOME shortcuts backend", () => {
  test("loads shortcut keys from installed schemas and custom launchers", async () => {
    const env = setup();
    await seedTerminal(env);
    const shortcuts = await env.run((backend) => backend.loadAllShortcuts());

    expect([...shortcuts.keys()].sort()).toEqual([
      customShortcutId(TERMINAL_PATH),
      `${CUSTOM_SCHEMA}.screensaver`,
      `${WM}.close`,
      `${WM}.minimize`,
      `${WM}.switch-to-workspace-1`,
    ]);

    const close = shortcuts.get(`${WM}.close`);
    expect(close?.accelerators).toEqual(["<Super>q"]);
    expect(close?.defaultAccelerators).toEqual(["<Alt>F4"]);
    expect(close?.isModified).toBe(true);
    expect(close?.allowMultiple).toBe(true);
    expect(close?.category).toBe("window-management");
    expect(close?.description).toBe("Summary of close");

    expect(shortcuts.get(`${CUSTOM_SCHEMA}.screensaver`)?.allowMultiple).toBe(false);

    const terminal = shortcuts.get(customShortcutId(TERMINAL_PATH));
    expect(terminal?.name).toBe("Terminal");
    expect(terminal?.isCustom).toBe(true);
    expect(terminal?.accelerators).toEqual(["<Super>Return"]);
  });

  test("writes empty bindings as the disabled sentinel", async () => {
    const env = setup();
    const saved = await env.run((backend) =>
      Effect.gen(function* () {
        const shortcuts = yield* backend.loadAllShortcuts();
        const results: Array<boolean> = [];
        for (const id of [`${WM}.close`, `${CUSTOM_SCHEMA}.screensaver`]) {
          const shortcut = shortcuts.get(id);
          if (shortcut !== undefined) {
            shortcut.clear();
            results.push(yield* backend.saveShortcut(shortcut));
          }
        }
        return results;
      }),
    );

    expect(saved).toEqual([true, true]);
    expect(env.gsettings.read(WM, "close")).toBe("['disabled']");
    expect(env.gsettings.read(CUSTOM_SCHEMA, "screensaver")).toBe("'disabled'");
  });

  test("returns false when the native key is gone", async () => {
    const env = setup();
    const shortcut = new Shortcut({
      id: `${WM}.gone`,
      name: "Gone",
      category: "window-management",
      location: { container: WM, key: "gone" },
    });
    expect(await env.run((backend) => backend.saveShortcut(shortcut))).toBe(false);
  });

  test("resets to the native default and updates the shortcut", async () => {
    const env = setup();
    const close = await env.run((backend) =>
      Effect.gen(function* () {
        const shortcut = (yield* backend.loadAllShortcuts()).get(`${WM}.close`);
        if (shortcut === undefined) {
          return undefined;
        }
        yield* backend.resetShortcut(shortcut);
        return shortcut;
      }),
    );
    expect(close?.accelerators).toEqual(["<Alt>F4"]);
    expect(env.gsettings.read(WM, "close")).toBe("['<Alt>F4']");
  });

  test("manages custom keybindings", async () => {
    const env = setup();
    await seedTerminal(env);

    const added = await env.run((backend) =>
      backend.addCustomKeybinding("Browser", "firefox", "<Super>b"),
    );
    const browserPath = `${CUSTOM_PATH_PREFIX}/custom1/`;
    expect(added).toEqual(Option.some(browserPath));
    expect(env.gsettings.read(CUSTOM_SCHEMA, CUSTOM_LIST_KEY)).toBe(
      `['${TERMINAL_PATH}', '${browserPath}']`,
    );

    const missing = await env.run((backend) =>
      backend.updateCustomKeybinding("/nowhere/", { name: "x" }),
    );
    expect(missing).toBe(false);
    expect(await env.run((backend) => backend.deleteCustomKeybinding(TERMINAL_PATH))).toBe(true);
    expect(env.gsettings.read(env.address, "name")).toBeUndefined();

    const customs = await env.run((backend) => backend.getCustomKeybindings());
    expect(customs).toEqual([
      { path: browserPath, name: "Browser", command: "firefox", binding: "<Super>b" },
    ]);
  });

  test("finds conflicts, excluding the given id", async () => {
    const env = setup();
    const binding = parseAccelerator("<Super>h");
    if (binding === null) {
      throw new Error("fixture accelerator must parse");
    }
    const conflicts = await env.run((backend) => backend.findConflicts(binding));
    expect(conflicts.map((shortcut) => shortcut.id)).toEqual([`${WM}.minimize`]);
    const excluded = await env.run((backend) => backend.findConflicts(binding, `${WM}.minimize`));
    expect(excluded).toEqual([]);
  });
});
