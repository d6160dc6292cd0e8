import { Ansis } from "ansis";
import {
  Cause,
  Effect,
  type HashMap,
  Inspectable,
  Layer,
  List,
  Logger,
  type LogLevel,
  type LogSpan,
  Option,
  Predicate,
} from "effect";

import { loggingConfig } from "~/config";

const JSON_TOKEN_PATTERN =
  /("(?:\\.|[^"\\])*(?<!\\)")(?=\s*:)|("(?:\\.|[^"\\])*(?<!\\)")|\b-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?\b|\btrue\b|\bfalse\b|\bnull\b|[{}[\]:,]/g;

const TREE = {
  branch: "├─",
  corner: "└─",
  vertical: "│  ",
  blank: "   ",
} as const;

const LEVEL_SYMBOLS: Partial<Record<LogLevel.Literal, string>> = {
  Trace: "●",
  Debug: "◆",
  Info: "ℹ",
  Warning: "⚠",
  Error: "✖",
  Fatal: "💀",
};

export interface CliLoggerOptions {
  readonly noColor?: boolean;
}

interface Node {
  readonly head: string;
  readonly tail: ReadonlyArray<string>;
}

function formatTime(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

function levelStyle(color: Ansis, level: LogLevel.Literal) {
  switch (level) {
    case "Trace":
      return color.magentaBright;
    case "Debug":
      return color.cyanBright;
    case "Info":
      return color.blueBright;
    case "Warning":
      return color.yellowBright;
    case "Error":
      return color.redBright;
    case "Fatal":
      return color.white.bgRed;
    default:
      return color.white;
  }
}

function highlightJson(color: Ansis, json: string): string {
  return json.replace(
    JSON_TOKEN_PATTERN,
    (token, keyString: string | undefined, valueString: string | undefined) => {
      if (keyString !== undefined) {
        return color.cyanBright(token);
      }
      if (valueString !== undefined) {
        return color.greenBright(token);
      }
      if (token === "true" || token === "false") {
        return color.yellowBright(token);
      }
      if (token === "null") {
        return color.gray.dim(token);
      }
      return /^-?\d/.test(token) ? color.magentaBright(token) : color.gray(token);
    },
  );
}

function renderValue(color: Ansis, value: unknown): string {
  const redacted = Inspectable.redact(value);
  try {
    const json = JSON.stringify(redacted);
    if (json !== undefined) {
      return highlightJson(color, json);
    }
  } catch {
    // BigInt and cycles fall through to the inspector
  }
  return color.white(Inspectable.toStringUnknown(redacted, 0));
}

// The first string arguments form the headline; records spread into fields
function splitMessage(message: unknown): {
  readonly headline: string;
  readonly fields: Array<readonly [string, unknown]>;
} {
  const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message];
  const words: Array<string> = [];
  const fields: Array<readonly [string, unknown]> = [];
  for (const part of parts) {
    if (typeof part === "string" && fields.length === 0) {
      words.push(part);
    } else if (Predicate.isRecord(part)) {
      fields.push(...Object.entries(part));
    } else {
      fields.push(["value", part]);
    }
  }
  return { headline: words.join(" "), fields };
}

function errorNode(color: Ansis, error: Error): Node {
  const tail: Array<string> = [];
  let indent = "  ";
  for (let cause = error.cause; cause instanceof Error; cause = cause.cause) {
    tail.push(
      `${indent}${color.gray("╰→ caused by")} ${color.red(cause.name)}: ${color.white(cause.message)}`,
    );
    indent += "  ";
  }
  return {
    head: `${color.red.bold(`✖ ${error.name}`)}: ${color.white(error.message)}`,
    tail,
  };
}

function causeNodes(color: Ansis, cause: Cause.Cause<unknown>): Array<Node> {
  if (Cause.isEmpty(cause)) {
    return [];
  }
  const errors = Cause.prettyErrors(cause);
  if (errors.length === 0) {
    const [first = "", ...rest] = Cause.pretty(cause).split("\n");
    return [{ head: color.red.bold(`✖ ${first}`), tail: rest.map((line) => color.gray(line)) }];
  }
  const seen = new Set<string>();
  return errors
    .filter((error) => {
      const signature = `${error.name}|${error.message}`;
      const fresh = !seen.has(signature);
      seen.add(signature);
      return fresh;
    })
    .map((error) => errorNode(color, error));
}

function spanText(color: Ansis, spans: List.List<LogSpan.LogSpan>, date: Date): string {
  // Effect.fn spans nest; only the innermost is worth a terminal column
  const innermost = List.head(spans);
  if (Option.isNone(innermost)) {
    return "";
  }
  const durationMs = Math.max(0, date.getTime() - innermost.value.startTime);
  return color.gray.dim(`[${innermost.value.label}: ${durationMs}ms]`);
}

function annotationFields(
  annotations: HashMap.HashMap<string, unknown>,
): Array<readonly [string, unknown]> {
  return Array.from(annotations).sort(([a], [b]) => a.localeCompare(b));
}

/** One header line, then payload fields, annotations and failures as a tree. */
export function makeCliStringLogger(options?: CliLoggerOptions) {
  const color = options?.noColor === true ? new Ansis(0) : new Ansis();

  return Logger.make(({ annotations, cause, date, logLevel, message, spans }) => {
    const levelColor = levelStyle(color, logLevel._tag);
    const { headline, fields } = splitMessage(message);
    const header = [
      levelColor(LEVEL_SYMBOLS[logLevel._tag] ?? "•"),
      levelColor.bold(logLevel._tag.toUpperCase().padEnd(5, " ")),
      color.gray(formatTime(date)),
      spanText(color, spans, date),
      color.white(headline),
    ]
      .filter((part) => part.length > 0)
      .join(" ");

    const nodes: Array<Node> = [
      ...[...fields, ...annotationFields(annotations)].map(([key, value]) => ({
        head: `${color.gray(key)}: ${renderValue(color, value)}`,
        tail: [],
      })),
      ...causeNodes(color, cause),
    ];

    const lines = [header];
    nodes.forEach((node, index) => {
      const last = index === nodes.length - 1;
      lines.push(`${color.gray(last ? TREE.corner : TREE.branch)} ${node.head}`);
      for (const line of node.tail) {
        lines.push(`${color.gray(last ? TREE.blank : TREE.vertical)}${line}`);
      }
    });
    return lines.join("\n");
  });
}

/** Logs go to stderr so command output on stdout stays pipeable. */
export const makeCliLogger = (options?: CliLoggerOptions) =>
  Logger.withConsoleError(makeCliStringLogger(options));

export const CliLoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const { logLevel, noColor } = yield* loggingConfig;
    return Layer.merge(
      Logger.replace(Logger.defaultLogger, makeCliLogger({ noColor })),
      Logger.minimumLogLevel(logLevel),
    );
  }),
);
