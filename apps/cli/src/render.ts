import {
  type AcceleratorDelta,
  type CustomKeybinding,
  isPreset,
  LauncherSetup,
  type Profile,
  type Shortcut,
  type ShortcutCategory,
  xkbOptionList,
} from "@keysync/core";
import { Console, Effect } from "effect";

const NONE = "(none)";

const listOrNone = (accelerators: ReadonlyArray<string>): string =>
  accelerators.length === 0 ? NONE : accelerators.join(", ");

export const printLines = (lines: ReadonlyArray<string>) =>
  lines.length === 0 ? Effect.void : Console.log(lines.join("\n"));

export const shortcutLine = (shortcut: Shortcut): string => {
  const label = shortcut.label === "" ? "disabled" : shortcut.label;
  return `  ${shortcut.id}  ${label}${shortcut.isModified ? "  (modified)" : ""}`;
};

/** Shortcuts under their category headings, categories in adapter order. */
export function shortcutTable(
  categories: ReadonlyArray<ShortcutCategory>,
  shortcuts: Iterable<Shortcut>,
): Array<string> {
  const byCategory = new Map<string, Array<Shortcut>>();
  for (const shortcut of shortcuts) {
    const bucket = byCategory.get(shortcut.category) ?? [];
    bucket.push(shortcut);
    byCategory.set(shortcut.category, bucket);
  }

  const known = categories.filter((category) => byCategory.has(category.id));
  const unknown = [...byCategory.keys()]
    .filter((id) => !categories.some((category) => category.id === id))
    .sort();
  const headings = [
    ...known.map((category) => [category.id, category.name] as const),
    ...unknown.map((id) => [id, id] as const),
  ];

  return headings.flatMap(([id, name]) => {
    const members = (byCategory.get(id) ?? []).sort((a, b) => a.id.localeCompare(b.id));
    return [`${name}:`, ...members.map(shortcutLine)];
  });
}

export const customLine = (custom: CustomKeybinding): string =>
  `${custom.path}  ${custom.name}  ${custom.binding === "" ? "disabled" : custom.binding}` +
  (custom.command === "" ? "" : `  ${custom.command}`);

export const launcherSetupLine = LauncherSetup.$match({
  Added: ({ type, command, path }) => `${type}: added ${command} at ${path}`,
  Updated: ({ type, command, path }) => `${type}: ${path} now runs ${command}`,
  Failed: ({ type, command }) => `${type}: could not set up ${command}`,
  NotFound: ({ type }) => `${type}: no app found`,
});

export const profileLine = (profile: Profile): string =>
  [profile.name, isPreset(profile) ? "(preset)" : "", profile.description]
    .filter((part) => part !== "")
    .join("  ");

export function profileDetails(profile: Profile): Array<string> {
  const lines = [
    `Name: ${profile.name}`,
    `Description: ${profile.description}`,
    `Author: ${profile.author}`,
    `Version: ${profile.version}`,
    `Modified: ${profile.modified.toISOString()}`,
  ];
  const xkb = xkbOptionList(profile.xkb);
  if (xkb.length > 0) {
    lines.push(`XKB options: ${xkb.join(", ")}`);
  }
  if (profile.macKeyboard !== undefined) {
    lines.push(`Mac keyboard: fn ${profile.macKeyboard.fnMode}`);
  }
  const keys = Object.keys(profile.shortcuts).sort();
  lines.push(`Shortcuts (${keys.length}):`);
  for (const key of keys) {
    lines.push(`  ${key} = ${listOrNone(profile.shortcuts[key] ?? [])}`);
  }
  return lines;
}

export const deltaLines = (deltas: ReadonlyMap<string, AcceleratorDelta>): Array<string> =>
  [...deltas.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([id, delta]) => `  ${id}: ${listOrNone(delta.current)} -> ${listOrNone(delta.expected)}`);
