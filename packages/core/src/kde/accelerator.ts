import kdeKeyTable from "../../data/kde-keys.json";
import { keyGlyph } from "../accelerator/keysyms";
import { parseAccelerator } from "../accelerator/codec";
import type { ModifierName } from "../model/modifier";

export const KDE_NONE = "none";

const KDE_TO_KEYSYM = new Map<string, string>(
  Object.entries(kdeKeyTable).map(([name, keysym]) => [name.toLowerCase(), keysym] as const),
);

// First spelling listed wins, so `Escape` is written back as `Esc`
const KEYSYM_TO_KDE = new Map<string, string>();
for (const [name, keysym] of Object.entries(kdeKeyTable)) {
  if (!KEYSYM_TO_KDE.has(keysym)) {
    KEYSYM_TO_KDE.set(keysym, name);
  }
}

const KDE_MODIFIERS = new Map<string, ModifierName>([
  ["meta", "Super"],
  ["super", "Super"],
  ["ctrl", "Control"],
  ["control", "Control"],
  ["alt", "Alt"],
  ["shift", "Shift"],
]);

// Qt writes modifiers in this order
const KDE_MODIFIER_ORDER: ReadonlyArray<readonly [ModifierName, string]> = [
  ["Super", "Meta"],
  ["Control", "Ctrl"],
  ["Alt", "Alt"],
  ["Shift", "Shift"],
];

// Keys that would otherwise split the `current,default,description` triple
const KDE_ESCAPED_KEYS = new Map<string, string>([
  [",", "\\,"],
  ["\\", "\\\\"],
]);

export interface ShortcutTriple {
  readonly current: string;
  readonly defaultValue: string;
  readonly description: string;
}

/** Index of the next comma that is not escaped with a backslash. */
function unescapedComma(text: string, from: number): number {
  for (let index = from; index < text.length; index++) {
    const char = text.charAt(index);
    if (char === "\\") {
      index++;
    } else if (char === ",") {
      return index;
    }
  }
  return -1;
}

/**
 * Splits `current,default,description` on its first two commas. Anything after
 * the second comma, commas included, is the description.
 */
export function parseShortcutTriple(value: string): ShortcutTriple {
  const first = unescapedComma(value, 0);
  if (first < 0) {
    return { current: value, defaultValue: "", description: "" };
  }
  const second = unescapedComma(value, first + 1);
  if (second < 0) {
    return {
      current: value.slice(0, first),
      defaultValue: value.slice(first + 1),
      description: "",
    };
  }
  return {
    current: value.slice(0, first),
    defaultValue: value.slice(first + 1, second),
    description: value.slice(second + 1),
  };
}

export const formatShortcutTriple = (triple: ShortcutTriple): string =>
  `${triple.current},${triple.defaultValue},${triple.description}`;

/**
 * First shortcut of a field that may pack several, separated by a tab (raw or
 * escaped) or an escaped comma. `Meta+\,` is the comma key, not a separator,
 * and `Meta+\\` is the backslash key.
 */
export function firstKdeShortcut(field: string): string {
  let shortcut = "";
  for (let index = 0; index < field.length; index++) {
    const char = field.charAt(index);
    if (char === "\t") {
      break;
    }
    if (char === "\\") {
      const escaped = field.charAt(index + 1);
      index++;
      if (escaped === "t") {
        break;
      }
      if (escaped === "," && !(shortcut.endsWith("+") || shortcut === "")) {
        break;
      }
      shortcut += escaped === "s" ? " " : escaped;
      continue;
    }
    shortcut += char;
  }
  return shortcut.trim();
}

/**
 * Translates one KDE shortcut (`Meta+Shift+Return`) to canonical accelerator
 * text. Returns null for `none`, the empty string and unknown modifiers.
 */
export function kdeToCanonical(shortcut: string): string | null {
  const text = shortcut.trim();
  if (text === "" || text.toLowerCase() === KDE_NONE) {
    return null;
  }

  let key: string;
  let modifierPart: string;
  if (text === "+" || text.endsWith("++")) {
    key = "+";
    modifierPart = text.slice(0, -2);
  } else {
    const split = text.lastIndexOf("+");
    key = text.slice(split + 1);
    modifierPart = split < 0 ? "" : text.slice(0, split);
  }
  if (key === "") {
    return null;
  }

  const modifiers = new Set<ModifierName>();
  for (const part of modifierPart === "" ? [] : modifierPart.split("+")) {
    const modifier = KDE_MODIFIERS.get(part.trim().toLowerCase());
    if (modifier === undefined) {
      return null;
    }
    modifiers.add(modifier);
  }

  const keysym = KDE_TO_KEYSYM.get(key.toLowerCase()) ?? key;
  const prefix = [...modifiers].map((modifier) => `<${modifier}>`).join("");
  return `${prefix}${keysym}`;
}

/**
 * Translates canonical accelerator text to a KDE shortcut. The empty string
 * becomes `none`; Hyper and Meta have no KDE spelling and yield null.
 */
export function canonicalToKde(accelerator: string): string | null {
  if (accelerator === "") {
    return KDE_NONE;
  }
  const binding = parseAccelerator(accelerator);
  if (binding === null || binding.has("Hyper") || binding.has("Meta")) {
    return null;
  }

  const key =
    KEYSYM_TO_KDE.get(binding.key) ??
    (binding.key.length === 1 ? binding.key.toUpperCase() : keyGlyph(binding.key)) ??
    binding.key;
  const modifiers = KDE_MODIFIER_ORDER.filter(([name]) => binding.has(name)).map(
    ([, spelling]) => `${spelling}+`,
  );
  return `${modifiers.join("")}${KDE_ESCAPED_KEYS.get(key) ?? key}`;
}
