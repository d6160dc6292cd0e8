import { Array as Arr, type Option } from "effect";

import type { CustomKeybinding } from "../model/shortcut";

export type LauncherType = "terminal" | "file_manager" | "browser" | "music" | "cheat_sheet";

const LAUNCHER_KEYWORDS: Readonly<Record<LauncherType, ReadonlyArray<string>>> = {
  terminal: ["terminal", "term", "console", "shell"],
  file_manager: ["file", "files", "folder", "nautilus", "thunar", "dolphin", "manager"],
  browser: ["browser", "firefox", "chrome", "chromium", "web", "internet"],
  cheat_sheet: ["cheat", "keysync", "shortcut", "help"],
  music: ["music", "spotify", "player", "rhythmbox", "tidal", "audio"],
};

export const findCustomKeybinding = (
  bindings: ReadonlyArray<CustomKeybinding>,
  name: string,
): Option.Option<CustomKeybinding> => Arr.findFirst(bindings, (binding) => binding.name === name);

/** First launcher whose name or command mentions one of the type's keywords. */
export const findCustomKeybindingByType = (
  bindings: ReadonlyArray<CustomKeybinding>,
  type: LauncherType,
): Option.Option<CustomKeybinding> => {
  const keywords = LAUNCHER_KEYWORDS[type];
  return Arr.findFirst(bindings, (binding) => {
    const name = binding.name.toLowerCase();
    const command = binding.command.toLowerCase();
    return keywords.some((keyword) => name.includes(keyword) || command.includes(keyword));
  });
};

/** Lowest `prefix<N>` not already taken by `existing`. */
export const nextCustomId = (existing: Iterable<string>, prefix = "custom"): string => {
  const taken = new Set<number>();
  const pattern = new RegExp(`${prefix}(\\d+)`);
  for (const id of existing) {
    const match = pattern.exec(id);
    if (match?.[1] !== undefined) {
      taken.add(Number.parseInt(match[1], 10));
    }
  }
  let index = 0;
  while (taken.has(index)) {
    index++;
  }
  return `${prefix}${index}`;
};
