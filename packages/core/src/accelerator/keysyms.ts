import keysymTable from "../../data/keysyms.json";

const FUNCTION_KEY = /^f([1-9]|[12]\d|3[0-5])$/i;
const MEDIA_KEY = /^XF86[A-Za-z0-9_]+$/;

const byLowerName = new Map<string, string>(
  keysymTable.named.map((name) => [name.toLowerCase(), name] as const),
);
const aliases = new Map<string, string>(Object.entries(keysymTable.aliases));
const symbols = new Map<string, string>(Object.entries(keysymTable.symbols));
const glyphs = new Map<string, string>(
  Object.entries(keysymTable.symbols).map(([glyph, name]) => [name, glyph] as const),
);
const labels = new Map<string, string>(Object.entries(keysymTable.labels));

/**
 * Resolves a key token to its canonical key name, or null when the token is
 * not a key this codec knows.
 */
export function resolveKeyName(token: string): string | null {
  if (token.length === 0) {
    return null;
  }

  if (token.length === 1) {
    if (/[A-Za-z]/.test(token)) {
      return token.toLowerCase();
    }
    if (/\d/.test(token)) {
      return token;
    }
    return symbols.get(token) ?? null;
  }

  const lower = token.toLowerCase();
  const named = byLowerName.get(lower) ?? aliases.get(lower);
  if (named !== undefined) {
    return named;
  }

  const functionKey = FUNCTION_KEY.exec(token);
  if (functionKey !== null) {
    return `F${functionKey[1]}`;
  }

  return MEDIA_KEY.test(token) ? token : null;
}

/** The printable character for a punctuation key name (`slash` → `/`). */
export function keyGlyph(name: string): string | undefined {
  return glyphs.get(name);
}

export function keyLabel(name: string): string {
  const label = labels.get(name);
  if (label !== undefined) {
    return label;
  }
  const glyph = glyphs.get(name);
  if (glyph !== undefined) {
    return glyph === " " ? "Space" : glyph;
  }
  if (name.length === 1) {
    return name.toUpperCase();
  }
  return name.replace(/^XF86/, "").replaceAll("_", " ");
}
