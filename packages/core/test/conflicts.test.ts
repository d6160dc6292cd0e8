import { Option } from "effect";
import { describe, expect, test } from "vitest";

import { parseAccelerator, parseAccelerators } from "../src/accelerator/codec";
import { conflictGroups, conflictsIn } from "../src/backend/conflicts";
import { findCustomKeybindingByType, nextCustomId } from "../src/backend/custom";
import { Shortcut } from "../src/model/shortcut";

const shortcut = (id: string, accelerators: ReadonlyArray<string>) =>
  new Shortcut({
    id,
    name: id,
    category: "shell",
    location: { container: "org.example", key: id },
    bindings: parseAccelerators(accelerators),
  });

const binding = (text: string) => {
  const parsed = parseAccelerator(text);
  if (parsed === null) {
    throw new Error(`fixture accelerator ${text} must parse`);
  }
  return parsed;
};

describe("conflictsIn", () => {
  const shortcuts = [
    shortcut("overview", ["<Super>s"]),
    shortcut("search", ["<Shift><Super>s", "<Super>s"]),
    shortcut("files", ["<Super>e"]),
  ];

  test("reports every shortcut sharing the binding", () => {
    const found = conflictsIn(shortcuts, binding("<Super>s"));
    expect(found.map((entry) => entry.id)).toEqual(["overview", "search"]);
  });

  test("never reports the excluded shortcut", () => {
    const found = conflictsIn(shortcuts, binding("<Super>s"), "overview");
    expect(found.map((entry) => entry.id)).toEqual(["search"]);
    expect(conflictsIn(shortcuts, binding("<Super>e"), "files")).toEqual([]);
  });

  test("groups shared accelerators", () => {
    const groups = conflictGroups(shortcuts);
    expect([...groups.keys()]).toEqual(["<Super>s"]);
    expect(groups.get("<Super>s")?.map((entry) => entry.id)).toEqual(["overview", "search"]);
  });
});

describe("custom keybinding helpers", () => {
  test("picks the lowest free id", () => {
    expect(nextCustomId([])).toBe("custom0");
    expect(nextCustomId(["/a/custom0/", "/a/custom2/"])).toBe("custom1");
  });

  test("finds launchers by type keywords", () => {
    const customs = [
      { path: "/c0/", name: "Open Files", command: "nautilus", binding: "<Super>e" },
      { path: "/c1/", name: "Term", command: "kgx", binding: "<Super>Return" },
    ];
    const terminal = findCustomKeybindingByType(customs, "terminal");
    expect(Option.getOrUndefined(terminal)?.path).toBe("/c1/");
    expect(Option.isNone(findCustomKeybindingByType(customs, "music"))).toBe(true);
  });
});
