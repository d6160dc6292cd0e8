import { ConfigProvider, Effect, Layer, Option } from "effect";
import { describe, expect, test } from "vitest";

import { parseAccelerators } from "../src/accelerator/codec";
import { ShortcutsBackend, type ShortcutsBackendShape } from "../src/backend/backend";
import { KdeShortcutsBackendLive } from "../src/kde/backend";
import { KConfigFile } from "../src/kde/kconfig";
import { Shortcut } from "../src/model/shortcut";

import { recordingDaemon } from "./support/daemon";
import { memoryFileSystem } from "./support/filesystem";

const RC = "/home/test/.config/kglobalshortcutsrc";

const FIXTURE = [
  "[kwin]",
  "Window Close=Alt+F4,Alt+F4,Close Window",
  "Expose=Ctrl+F9\\tMeta+W,Ctrl+F9,Toggle Present Windows",
  "_k_friendly_name=KWin",
  "",
  "[kmix]",
  "increase_volume=Volume Up,Volume Up,Increase Volume",
  "",
  "[plasmashell]",
  "show dashboard=Ctrl+F12,Ctrl+F12,Show Desktop",
  "",
  "[khotkeys]",
  "custom0=Meta+B,none,Browser",
  "",
].join("\n");

const setup = (files: Record<string, string> = { [RC]: FIXTURE }) => {
  const fs = memoryFileSystem(files);
  const daemon = recordingDaemon();
  const run = <A, E>(body: (backend: ShortcutsBackendShape) => Effect.Effect<A, E>) =>
    Effect.runPromise(
      Effect.gen(function* () {
        return yield* body(yield* ShortcutsBackend);
      }).pipe(
        Effect.provide(
          KdeShortcutsBackendLive.pipe(Layer.provide(Layer.merge(fs.layer, daemon.layer))),
        ),
        Effect.withConfigProvider(ConfigProvider.fromMap(new Map([["KGLOBALSHORTCUTSRC", RC]]))),
      ),
    );
  const entry = (group: string, key: string) =>
    KConfigFile.parse(fs.files.get(RC) ?? "").get(group, key);
  return { run, entry, daemon, fs };
};

describe("KDE shortcuts backend", () => {
  test("loads every component and the custom launchers", async () => {
    const { run } = setup();
    const shortcuts = await run((backend) => backend.loadAllShortcuts());

    expect([...shortcuts.keys()].sort()).toEqual([
      "custom:khotkeys/custom0",
      "kmix.increase_volume",
      "kwin.Expose",
      "kwin.Window Close",
      "plasmashell.show dashboard",
    ]);

    const close = shortcuts.get("kwin.Window Close");
    expect(close?.name).toBe("Window Close");
    expect(close?.description).toBe("Close Window");
    expect(close?.category).toBe("kwin");
    expect(close?.accelerators).toEqual(["<Alt>F4"]);
    expect(close?.isModified).toBe(false);
    expect(close?.allowMultiple).toBe(false);

    expect(shortcuts.get("kwin.Expose")?.accelerators).toEqual(["<Control>F9"]);
    expect(shortcuts.get("kmix.increase_volume")?.category).toBe("media");
    expect(shortcuts.get("kmix.increase_volume")?.name).toBe("Increase Volume");
    expect(shortcuts.get("kmix.increase_volume")?.accelerators).toEqual(["XF86AudioRaiseVolume"]);

    const browser = shortcuts.get("custom:khotkeys/custom0");
    expect(browser?.name).toBe("Browser");
    expect(browser?.isCustom).toBe(true);
    expect(browser?.accelerators).toEqual(["<Super>b"]);
  });

  test("treats a missing file as an empty store", async () => {
    const { run } = setup({});
    const shortcuts = await run((backend) => backend.loadAllShortcuts());
    expect(shortcuts.size).toBe(0);
  });

  test("rewrites the current field and reloads the daemon", async () => {
    const { run, entry, daemon } = setup();
    const saved = await run((backend) =>
      Effect.gen(function* () {
        const close = (yield* backend.loadAllShortcuts()).get("kwin.Window Close");
        if (close === undefined) {
          return false;
        }
        close.setBindings(parseAccelerators(["<Super>q"]));
        return yield* backend.saveShortcut(close);
      }),
    );

    expect(saved).toBe(true);
    expect(entry("kwin", "Window Close")).toBe("Meta+Q,Alt+F4,Close Window");
    expect(entry("kwin", "Expose")).toBe("Ctrl+F9\\tMeta+W,Ctrl+F9,Toggle Present Windows");
    expect(daemon.reloads()).toBe(1);
  });

  test("writes the backslash key without breaking the entry", async () => {
    const { run, entry } = setup();
    await run((backend) =>
      Effect.gen(function* () {
        const close = (yield* backend.loadAllShortcuts()).get("kwin.Window Close");
        if (close === undefined) {
          return false;
        }
        close.setBindings(parseAccelerators(["<Super>backslash"]));
        return yield* backend.saveShortcut(close);
      }),
    );
    expect(entry("kwin", "Window Close")).toBe("Meta+\\\\,Alt+F4,Close Window");

    const reloaded = (await run((backend) => backend.loadAllShortcuts())).get("kwin.Window Close");
    expect(reloaded?.accelerators).toEqual(["<Super>backslash"]);
    expect(reloaded?.description).toBe("Close Window");
    expect(reloaded?.isModified).toBe(true);
  });

  test("writes none for a cleared shortcut", async () => {
    const { run, entry } = setup();
    await run((backend) =>
      Effect.gen(function* () {
        const expose = (yield* backend.loadAllShortcuts()).get("kwin.Expose");
        if (expose === undefined) {
          return false;
        }
        expose.clear();
        return yield* backend.saveShortcut(expose);
      }),
    );
    expect(entry("kwin", "Expose")).toBe("none,Ctrl+F9,Toggle Present Windows");
  });

  test("refuses entries that vanished or bindings KDE cannot spell", async () => {
    const { run, daemon } = setup();
    const gone = new Shortcut({
      id: "kwin.Gone",
      name: "Gone",
      category: "kwin",
      location: { container: "kwin", key: "Gone" },
      bindings: parseAccelerators(["<Super>g"]),
    });
    const results = await run((backend) =>
      Effect.gen(function* () {
        const dashboard = (yield* backend.loadAllShortcuts()).get("plasmashell.show dashboard");
        if (dashboard === undefined) {
          return [];
        }
        dashboard.setBindings(parseAccelerators(["<Hyper>d"]));
        return [yield* backend.saveShortcut(dashboard), yield* backend.saveShortcut(gone)];
      }),
    );
    expect(results).toEqual([false, false]);
    expect(daemon.reloads()).toBe(0);
  });

  test("resets to the default field", async () => {
    const modified = FIXTURE.replace(
      "Window Close=Alt+F4,Alt+F4",
      "Window Close=Meta+Q,Alt+F4",
    );
    const { run, entry } = setup({ [RC]: modified });
    const close = await run((backend) =>
      Effect.gen(function* () {
        const shortcut = (yield* backend.loadAllShortcuts()).get("kwin.Window Close");
        if (shortcut === undefined) {
          return undefined;
        }
        expect(shortcut.isModified).toBe(true);
        yield* backend.resetShortcut(shortcut);
        return shortcut;
      }),
    );
    expect(close?.accelerators).toEqual(["<Alt>F4"]);
    expect(entry("kwin", "Window Close")).toBe("Alt+F4,Alt+F4,Close Window");
  });

  test("manages custom launchers in the khotkeys group", async () => {
    const { run, entry } = setup();

    const added = await run((backend) =>
      backend.addCustomKeybinding("Terminal", "konsole", "<Super>Return"),
    );
    expect(added).toEqual(Option.some("khotkeys/custom1"));
    expect(entry("khotkeys", "custom1")).toBe("Meta+Return,none,Terminal");

    const renamed = await run((backend) =>
      backend.updateCustomKeybinding("khotkeys/custom0", { name: "Web" }),
    );
    expect(renamed).toBe(true);
    expect(entry("khotkeys", "custom0")).toBe("Meta+B,none,Web");
    const outside = await run((backend) =>
      backend.updateCustomKeybinding("kwin/Expose", { name: "x" }),
    );
    expect(outside).toBe(false);

    expect(await run((backend) => backend.deleteCustomKeybinding("khotkeys/custom0"))).toBe(true);
    expect(entry("khotkeys", "custom0")).toBeUndefined();
    expect(await run((backend) => backend.getCustomKeybindings())).toEqual([
      { path: "khotkeys/custom1", name: "Terminal", command: "", binding: "<Super>Return" },
    ]);
  });
});
