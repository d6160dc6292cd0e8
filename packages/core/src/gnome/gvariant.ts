import { Data } from "effect";

/**
 * The slice of GVariant text format the shortcut schemas use: a string, a
 * string array, or anything else kept verbatim.
 */
export type GVariant = Data.TaggedEnum<{
  String: { readonly value: string };
  StringArray: { readonly value: ReadonlyArray<string> };
  Other: { readonly text: string };
}>;

export const GVariant = Data.taggedEnum<GVariant>();

interface Cursor {
  readonly text: string;
  index: number;
}

function skipSpaces(cursor: Cursor): void {
  while (cursor.index < cursor.text.length && /\s/.test(cursor.text.charAt(cursor.index))) {
    cursor.index++;
  }
}

function readString(cursor: Cursor): string | undefined {
  const quote = cursor.text.charAt(cursor.index);
  if (quote !== "'" && quote !== '"') {
    return undefined;
  }
  cursor.index++;

  let value = "";
  while (cursor.index < cursor.text.length) {
    const char = cursor.text.charAt(cursor.index++);
    if (char === quote) {
      return value;
    }
    if (char === "\\") {
      const escaped = cursor.text.charAt(cursor.index++);
      value += escaped === "n" ? "\n" : escaped === "t" ? "\t" : escaped;
      continue;
    }
    value += char;
  }
  return undefined;
}

function readStringArray(cursor: Cursor): Array<string> | undefined {
  if (cursor.text.charAt(cursor.index) !== "[") {
    return undefined;
  }
  cursor.index++;

  const values: Array<string> = [];
  skipSpaces(cursor);
  if (cursor.text.charAt(cursor.index) === "]") {
    cursor.index++;
    return values;
  }

  while (cursor.index < cursor.text.length) {
    skipSpaces(cursor);
    const value = readString(cursor);
    if (value === undefined) {
      return undefined;
    }
    values.push(value);
    skipSpaces(cursor);

    const separator = cursor.text.charAt(cursor.index++);
    if (separator === "]") {
      return values;
    }
    if (separator !== ",") {
      return undefined;
    }
  }
  return undefined;
}

export function parseGVariant(input: string): GVariant {
  const text = input.trim();
  const body = text.startsWith("@as ") ? text.slice(4).trimStart() : text;
  const cursor: Cursor = { text: body, index: 0 };

  const array = readStringArray(cursor);
  if (array !== undefined && cursor.index === body.length) {
    return GVariant.StringArray({ value: array });
  }

  cursor.index = 0;
  const value = readString(cursor);
  if (value !== undefined && cursor.index === body.length) {
    return GVariant.String({ value });
  }

  return GVariant.Other({ text });
}

const quote = (value: string): string =>
  `'${value.replaceAll("\\", "\\\\").replaceAll("'", "\\'")}'`;

export const formatGVariant: (variant: GVariant) => string = GVariant.$match({
  String: ({ value }) => quote(value),
  StringArray: ({ value }) => (value.length === 0 ? "@as []" : `[${value.map(quote).join(", ")}]`),
  Other: ({ text }) => text,
});

/** GVariant type string of the value, as the classifier compares it. */
export const gvariantType: (variant: GVariant) => string = GVariant.$match({
  String: () => "s",
  StringArray: () => "as",
  Other: () => "?",
});

/** String entries of a value; non-string values carry none. */
export const gvariantStrings: (variant: GVariant) => ReadonlyArray<string> = GVariant.$match({
  String: ({ value }) => [value],
  StringArray: ({ value }) => value,
  Other: () => [],
});
