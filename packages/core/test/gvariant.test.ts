import { describe, expect, test } from "vitest";

import {
  formatGVariant,
  GVariant,
  gvariantStrings,
  gvariantType,
  parseGVariant,
} from "../src/gnome/gvariant";

describe("parseGVariant", () => {
  test("reads string arrays", () => {
    expect(parseGVariant("['<Super>q', '<Alt>F4']")).toEqual(
      GVariant.StringArray({ value: ["<Super>q", "<Alt>F4"] }),
    );
  });

  test("reads typed empty arrays", () => {
    expect(parseGVariant("@as []")).toEqual(GVariant.StringArray({ value: [] }));
    expect(parseGVariant("[]")).toEqual(GVariant.StringArray({ value: [] }));
  });

  test("reads single strings with either quote and escapes", () => {
    expect(parseGVariant("'<Control><Alt>t'")).toEqual(GVariant.String({ value: "<Control><Alt>t" }));
    expect(parseGVariant('"it\'s"')).toEqual(GVariant.String({ value: "it's" }));
    expect(parseGVariant("'a\\'b'")).toEqual(GVariant.String({ value: "a'b" }));
  });

  test("keeps anything else as opaque text", () => {
    expect(parseGVariant("uint32 4")).toEqual(GVariant.Other({ text: "uint32 4" }));
    expect(parseGVariant("true")).toEqual(GVariant.Other({ text: "true" }));
    expect(parseGVariant("['unterminated")).toEqual(GVariant.Other({ text: "['unterminated" }));
  });
});

describe("formatGVariant", () => {
  test("writes values gsettings accepts", () => {
    expect(formatGVariant(GVariant.StringArray({ value: [] }))).toBe("@as []");
    expect(formatGVariant(GVariant.StringArray({ value: ["<Super>q", "disabled"] }))).toBe(
      "['<Super>q', 'disabled']",
    );
    expect(formatGVariant(GVariant.String({ value: "it's" }))).toBe("'it\\'s'");
  });

  test("reports type and string entries", () => {
    expect(gvariantType(GVariant.String({ value: "x" }))).toBe("s");
    expect(gvariantType(GVariant.StringArray({ value: [] }))).toBe("as");
    expect(gvariantType(GVariant.Other({ text: "4" }))).toBe("?");
    expect(gvariantStrings(GVariant.Other({ text: "4" }))).toEqual([]);
    expect(gvariantStrings(parseGVariant(formatGVariant(GVariant.String({ value: "a\\b" }))))).toEqual([
      "a\\b",
    ]);
  });
});
