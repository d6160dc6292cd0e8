import { KeyBinding } from "../model/binding";
import {
  Modifier,
  MODIFIER_ORDER,
  modifierNames,
  type ModifierName,
  type Modifiers,
} from "../model/modifier";

import { keyLabel, resolveKeyName } from "./keysyms";

export const DISABLED = "disabled";

const MODIFIER_TOKENS: Readonly<Record<string, ModifierName>> = {
  control: "Control",
  ctrl: "Control",
  ctl: "Control",
  primary: "Control",
  shift: "Shift",
  shft: "Shift",
  alt: "Alt",
  mod1: "Alt",
  super: "Super",
  hyper: "Hyper",
  meta: "Meta",
};

const MODIFIER_LABELS: Readonly<Record<ModifierName, string>> = {
  Control: "Ctrl",
  Shift: "Shift",
  Alt: "Alt",
  Super: "Super",
  Hyper: "Hyper",
  Meta: "Meta",
};

export function modifierFromToken(token: string): ModifierName | undefined {
  return MODIFIER_TOKENS[token.toLowerCase()];
}

/**
 * Parses `<Mod>…key` accelerator text. Returns null for the empty string, the
 * `disabled` sentinel and any modifier or key token that does not resolve.
 */
export function parseAccelerator(text: string): KeyBinding | null {
  let rest = text.trim();
  if (rest.length === 0 || rest === DISABLED) {
    return null;
  }

  let modifiers: Modifiers = Modifier.None;
  while (rest.startsWith("<")) {
    const close = rest.indexOf(">");
    if (close < 0) {
      return null;
    }
    const name = modifierFromToken(rest.slice(1, close));
    if (name === undefined) {
      return null;
    }
    modifiers |= Modifier[name];
    rest = rest.slice(close + 1);
  }

  const key = resolveKeyName(rest);
  return key === null ? null : new KeyBinding({ key, modifiers });
}

export function formatAccelerator(binding: KeyBinding): string {
  const prefix = MODIFIER_ORDER.filter((name) => binding.has(name))
    .map((name) => `<${name}>`)
    .join("");
  return `${prefix}${binding.key}`;
}

/** Display label such as `Super+Shift+Enter`. Lossy: never parse the result. */
export function humanizeAccelerator(binding: KeyBinding): string {
  const modifiers = modifierNames(binding.modifiers).map((name) => MODIFIER_LABELS[name]);
  return [...modifiers, keyLabel(binding.key)].join("+");
}

export function normalizeAccelerator(text: string): string | null {
  const binding = parseAccelerator(text);
  return binding === null ? null : formatAccelerator(binding);
}

/** Canonical set of accelerator strings; unparsable entries are dropped. */
export function normalizeAccelerators(texts: Iterable<string>): Set<string> {
  const normalized = new Set<string>();
  for (const text of texts) {
    const canonical = normalizeAccelerator(text);
    if (canonical !== null) {
      normalized.add(canonical);
    }
  }
  return normalized;
}

export function sameAccelerators(left: Iterable<string>, right: Iterable<string>): boolean {
  const a = normalizeAccelerators(left);
  const b = normalizeAccelerators(right);
  if (a.size !== b.size) {
    return false;
  }
  for (const accelerator of a) {
    if (!b.has(accelerator)) {
      return false;
    }
  }
  return true;
}

export function parseAccelerators(texts: Iterable<string>): Array<KeyBinding> {
  const bindings: Array<KeyBinding> = [];
  for (const text of texts) {
    const binding = parseAccelerator(text);
    if (binding !== null) {
      bindings.push(binding);
    }
  }
  return bindings;
}
