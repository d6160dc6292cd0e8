import keyCategoryTable from "../../data/gnome-key-categories.json";
import type { ShortcutCategory } from "../model/category";

import { type GVariant, gvariantStrings, gvariantType } from "./gvariant";

export interface ShortcutSchema {
  readonly schema: string;
  readonly category: string;
}

export const SHORTCUT_SCHEMAS: ReadonlyArray<ShortcutSchema> = [
  { schema: "org.gnome.desktop.wm.keybindings", category: "window-management" },
  { schema: "org.gnome.shell.keybindings", category: "shell" },
  { schema: "org.gnome.settings-daemon.plugins.media-keys", category: "media" },
  { schema: "org.gnome.mutter.keybindings", category: "window-management" },
  { schema: "org.gnome.mutter.wayland.keybindings", category: "window-management" },
  { schema: "org.gnome.shell.extensions.tiling-assistant", category: "tiling" },
];

export const GNOME_CATEGORIES: ReadonlyArray<ShortcutCategory> = [
  {
    id: "tiling",
    name: "Tiling",
    icon: "view-grid-symbolic",
    description: "Snap and tile windows",
  },
  {
    id: "window-management",
    name: "Window Management",
    icon: "preferences-system-windows-symbolic",
    description: "Move, resize, and manage windows",
  },
  {
    id: "navigation",
    name: "Navigation",
    icon: "go-home-symbolic",
    description: "Navigate between workspaces and windows",
  },
  {
    id: "shell",
    name: "Shell",
    icon: "view-app-grid-symbolic",
    description: "Desktop shell functions",
  },
  {
    id: "media",
    name: "Media",
    icon: "multimedia-player-symbolic",
    description: "Media playback and volume controls",
  },
  {
    id: "accessibility",
    name: "Accessibility",
    icon: "preferences-desktop-accessibility-symbolic",
    description: "Accessibility features",
  },
  {
    id: "system",
    name: "System",
    icon: "preferences-system-symbolic",
    description: "System functions like lock screen and power",
  },
  {
    id: "custom",
    name: "Custom",
    icon: "application-x-addon-symbolic",
    description: "User-defined shortcuts",
  },
];

const KEY_CATEGORIES = new Map<string, string>(
  Object.entries(keyCategoryTable).flatMap(([category, keys]) =>
    keys.map((key) => [key, category] as const),
  ),
);

// Order matters: the first matching fragment rejects the key
const NON_SHORTCUT_PATTERNS = [
  "-ignore-ta",
  "-color",
  "-size",
  "-mode",
  "-behavior",
  "-rects",
  "enable-",
  "disable-",
  "default-",
  "debugging-",
  "dynamic-",
  "favorite-",
  "active-window-hint",
  "adapt-",
  "low-performance",
  "restore-window-size",
];

/**
 * Decides whether a schema key holds shortcuts: its name must not look like a
 * setting, it must be typed `s` or `as`, and a list default must contain at
 * least one plausible accelerator.
 */
export function isShortcutKey(key: string, defaultValue: GVariant): boolean {
  if (NON_SHORTCUT_PATTERNS.some((pattern) => key.includes(pattern))) {
    return false;
  }

  const type = gvariantType(defaultValue);
  if (type !== "as" && type !== "s") {
    return false;
  }

  if (type === "as") {
    const values = gvariantStrings(defaultValue);
    if (
      values.length > 0 &&
      !values.some(
        (value) =>
          value.startsWith("<") ||
          value.startsWith("XF86") ||
          value === "disabled" ||
          value === "" ||
          value.length <= 3,
      )
    ) {
      return false;
    }
  }

  return true;
}

const startsWithAny = (key: string, prefixes: ReadonlyArray<string>) =>
  prefixes.some((prefix) => key.startsWith(prefix));

export function keyCategory(key: string, schemaCategory: string): string {
  const known = KEY_CATEGORIES.get(key);
  if (known !== undefined) {
    return known;
  }
  if (startsWithAny(key, ["switch-to-", "move-to-", "switch-"])) {
    return "navigation";
  }
  if (startsWithAny(key, ["volume-", "mic-", "media-"])) {
    return "media";
  }
  if (startsWithAny(key, ["toggle-", "show-"])) {
    return "shell";
  }
  if (startsWithAny(key, ["begin-", "maximize", "minimize", "close", "raise", "lower"])) {
    return "window-management";
  }
  return schemaCategory;
}

export const INTERNAL_GROUP = "Internal";

const TILE_HALVES = [
  "left-half",
  "right-half",
  "top-half",
  "bottom-half",
  "toggle-tiled-left",
  "toggle-tiled-right",
];
const TILE_ACTIONS = [
  "tile-maximize",
  "tile-maximize-horizontally",
  "tile-maximize-vertically",
  "center-window",
  "restore-window",
  "tile-edit-mode",
  "auto-tile",
];
const WINDOW_STATE = [
  "maximize",
  "minimize",
  "unmaximize",
  "toggle-maximized",
  "maximize-horizontally",
  "maximize-vertically",
  "toggle-fullscreen",
];
const WINDOW_ACTIONS = [
  "close",
  "always-on-top",
  "toggle-above",
  "raise",
  "lower",
  "begin-move",
  "begin-resize",
];
const PLAYBACK = ["play", "pause", "stop", "previous", "next", "media", "eject"];
const SYSTEM = ["screensaver", "logout", "power", "suspend", "hibernate", "lock-screen"];
const ACCESSIBILITY = ["magnifier", "screenreader", "text-size", "contrast", "keyboard"];

/** Display sub-group within a category; the last rule is a catch-all. */
export function shortcutGroup(key: string): string {
  if (key.endsWith("-ignore-ta")) return INTERNAL_GROUP;
  if (TILE_HALVES.some((fragment) => key.includes(fragment))) return "Tile Halves";
  if (key.includes("quarter") || key.includes("corner")) return "Tile Quarters";
  if (key.startsWith("activate-layout")) return "Layouts";
  if (TILE_ACTIONS.includes(key)) return "Tile Actions";
  if (key.startsWith("switch-to-workspace")) return "Switch Workspace";
  if (key.startsWith("move-to-workspace")) return "Move to Workspace";
  if (key.startsWith("move-to-monitor")) return "Move to Monitor";
  if (key.startsWith("switch-") || key.startsWith("cycle-")) return "Switch Windows";
  if (key.startsWith("move-to-side")) return "Tile Halves";
  if (key.startsWith("move-to-corner") || key === "move-to-center") return "Tile Quarters";
  if (WINDOW_STATE.includes(key)) return "Window State";
  if (WINDOW_ACTIONS.includes(key)) return "Window Actions";
  if (key.startsWith("volume-") || key === "mic-mute") return "Volume";

  const base = key.endsWith("-static") ? key.slice(0, -"-static".length) : key;
  if (PLAYBACK.includes(base) || base.startsWith("playback-")) return "Playback";
  if (key.includes("screenshot") || key.includes("screen-recording")) return "Screenshots";
  if (key.startsWith("toggle-") || key.startsWith("show-")) return "Shell Actions";
  if (SYSTEM.includes(key)) return "System";
  if (ACCESSIBILITY.some((fragment) => key.includes(fragment))) return "Accessibility";
  if (key.includes("input-source")) return "Input";
  return "Other";
}

const MEDIA_NAMES = new Map<string, string>(
  Object.entries({
    next: "Next Track",
    previous: "Previous Track",
    play: "Play/Pause",
    pause: "Pause",
    stop: "Stop",
    eject: "Eject",
    "playback-forward": "Fast Forward",
    "playback-rewind": "Rewind",
    "playback-random": "Shuffle",
    "playback-repeat": "Repeat",
  }),
);

const REDUNDANT_PREFIXES = [
  "switch-to-workspace-",
  "move-to-workspace-",
  "switch-to-",
  "move-to-",
  "switch-",
  "toggle-tiled-",
  "toggle-",
  "begin-",
  "cycle-",
  "volume-",
  "show-",
  "tile-",
  "activate-",
];

const TILING_NAMES = new Map<string, string>(
  Object.entries({
    "left-half": "Left Half",
    "right-half": "Right Half",
    "top-half": "Top Half",
    "bottom-half": "Bottom Half",
    "topleft-quarter": "Top Left",
    "topright-quarter": "Top Right",
    "bottomleft-quarter": "Bottom Left",
    "bottomright-quarter": "Bottom Right",
    maximize: "Maximize",
    "maximize-horizontally": "Maximize Horizontal",
    "maximize-vertically": "Maximize Vertical",
    "center-window": "Center Window",
    "restore-window": "Restore Window",
    "edit-mode": "Edit Mode",
  }),
);

/**
 * Display name for a schema key. The group header already says "Switch
 * Workspace", so `switch-to-workspace-3` becomes just `3`. Returns the empty
 * string for internal keys that should not be listed.
 */
export function humanizeKeyName(key: string): string {
  let name = key.endsWith("-static") ? key.slice(0, -"-static".length) : key;

  const media = MEDIA_NAMES.get(name);
  if (media !== undefined) {
    return media;
  }

  const prefix = REDUNDANT_PREFIXES.find((candidate) => name.startsWith(candidate));
  if (prefix !== undefined) {
    name = name.slice(prefix.length);
  }

  if (name.endsWith("-ignore-ta")) {
    return "";
  }

  const tiling = TILING_NAMES.get(name);
  if (tiling !== undefined) {
    return tiling;
  }

  const layout = /^layout(\d+)$/.exec(name);
  if (layout?.[1] !== undefined) {
    return `Layout ${Number.parseInt(layout[1], 10) + 1}`;
  }

  const words = name.replaceAll("-", " ").replaceAll("_", " ").split(/\s+/).filter(Boolean);
  return words
    .map((word, index) =>
      word.length <= 2 && index > 0
        ? word
        : word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
    )
    .join(" ");
}
