/**
 * Minimal KConfig-style INI reader/writer. Groups and entries keep their file
 * order, and comment or blank lines are carried through a rewrite untouched.
 * Only groups added by `set` get a blank line in front of them.
 * Nested group headers such as `[services][org.kde.dolphin.desktop]` are
 * addressed with `/` between the parts.
 */

type Line =
  | { readonly _tag: "Entry"; readonly key: string; value: string }
  | { readonly _tag: "Raw"; readonly text: string };

interface Group {
  readonly name: string;
  readonly lines: Array<Line>;
  // Read from the file rather than added by `set`
  readonly parsed: boolean;
}

const HEADER = /^\[(.+)\]\s*$/;

const headerName = (header: string): string => header.split("][").join("/");
const headerText = (name: string): string => `[${name.split("/").join("][")}]`;

export class KConfigFile {
  private readonly preamble: Array<string> = [];
  private readonly groups: Array<Group> = [];

  static parse(text: string): KConfigFile {
    const file = new KConfigFile();
    let current: Group | undefined;

    const rawLines = text.split(/\r?\n/);
    if (rawLines.at(-1) === "") {
      rawLines.pop();
    }

    for (const rawLine of rawLines) {
      const trimmed = rawLine.trim();
      const header = HEADER.exec(trimmed);
      if (header?.[1] !== undefined) {
        current = file.group(headerName(header[1]), true);
        continue;
      }

      const separator = rawLine.indexOf("=");
      const isEntry = separator > 0 && !trimmed.startsWith("#") && !trimmed.startsWith(";");
      if (current === undefined) {
        file.preamble.push(rawLine);
      } else if (isEntry) {
        const key = rawLine.slice(0, separator).trim();
        const value = rawLine.slice(separator + 1);
        const existing = KConfigFile.findEntry(current, key);
        if (existing === undefined) {
          current.lines.push({ _tag: "Entry", key, value });
        } else {
          existing.value = value;
        }
      } else {
        current.lines.push({ _tag: "Raw", text: rawLine });
      }
    }

    return file;
  }

  private static findEntry(group: Group, key: string) {
    for (const line of group.lines) {
      if (line._tag === "Entry" && line.key === key) {
        return line;
      }
    }
    return undefined;
  }

  private group(name: string, parsed = false): Group {
    const existing = this.groups.find((group) => group.name === name);
    if (existing !== undefined) {
      return existing;
    }
    const created: Group = { name, lines: [], parsed };
    this.groups.push(created);
    return created;
  }

  groupNames(): Array<string> {
    return this.groups.map((group) => group.name);
  }

  hasGroup(name: string): boolean {
    return this.groups.some((group) => group.name === name);
  }

  entries(groupName: string): Array<readonly [key: string, value: string]> {
    const group = this.groups.find((candidate) => candidate.name === groupName);
    if (group === undefined) {
      return [];
    }
    const entries: Array<readonly [string, string]> = [];
    for (const line of group.lines) {
      if (line._tag === "Entry") {
        entries.push([line.key, line.value]);
      }
    }
    return entries;
  }

  get(groupName: string, key: string): string | undefined {
    const group = this.groups.find((candidate) => candidate.name === groupName);
    return group === undefined ? undefined : KConfigFile.findEntry(group, key)?.value;
  }

  set(groupName: string, key: string, value: string): void {
    const group = this.group(groupName);
    const existing = KConfigFile.findEntry(group, key);
    if (existing !== undefined) {
      existing.value = value;
      return;
    }
    // Keep trailing blank lines after the new entry
    let index = group.lines.length;
    while (index > 0) {
      const previous = group.lines[index - 1];
      if (previous === undefined || previous._tag !== "Raw" || previous.text.trim() !== "") {
        break;
      }
      index--;
    }
    group.lines.splice(index, 0, { _tag: "Entry", key, value });
  }

  remove(groupName: string, key: string): boolean {
    const group = this.groups.find((candidate) => candidate.name === groupName);
    if (group === undefined) {
      return false;
    }
    const index = group.lines.findIndex((line) => line._tag === "Entry" && line.key === key);
    if (index < 0) {
      return false;
    }
    group.lines.splice(index, 1);
    return true;
  }

  toString(): string {
    const lines = [...this.preamble];
    for (const group of this.groups) {
      if (!group.parsed && lines.length > 0 && lines.at(-1)?.trim() !== "") {
        lines.push("");
      }
      lines.push(headerText(group.name));
      for (const line of group.lines) {
        lines.push(line._tag === "Entry" ? `${line.key}=${line.value}` : line.text);
      }
    }
    return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
  }
}
