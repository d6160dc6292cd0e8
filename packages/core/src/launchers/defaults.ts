import { Data, Effect, Option, Schema } from "effect";

import launcherApps from "../../data/launcher-apps.json";
import { ShortcutsBackend, type DesktopEnvironment } from "../backend/backend";
import { findCustomKeybinding, findCustomKeybindingByType, type LauncherType } from "../backend/custom";

import { AppLocator } from "./locator";

const BinaryCandidate = Schema.Struct({ binary: Schema.String, command: Schema.String });

const FlatpakCandidate = Schema.Struct({ flatpak: Schema.String });

// Asks the desktop for its default handler, then maps the answer to a command
const QueryCandidate = Schema.Struct({
  query: Schema.Struct({ command: Schema.String, args: Schema.Array(Schema.String) }),
  matches: Schema.Array(
    Schema.Struct({
      match: Schema.String,
      binary: Schema.optional(Schema.String),
      command: Schema.String,
    }),
  ),
});

const AppCandidate = Schema.Union(BinaryCandidate, FlatpakCandidate, QueryCandidate);
type AppCandidate = typeof AppCandidate.Type;

const DesktopApps = Schema.Struct({
  terminal: Schema.Array(AppCandidate),
  file_manager: Schema.Array(AppCandidate),
  browser: Schema.Array(AppCandidate),
  music: Schema.Array(AppCandidate),
});

const LAUNCHER_APPS = Schema.decodeUnknownSync(
  Schema.Struct({ gnome: DesktopApps, kde: DesktopApps }),
)(launcherApps);

export type DefaultLauncherType = keyof typeof DesktopApps.Type;

export interface DefaultLauncher {
  readonly type: DefaultLauncherType;
  readonly name: string;
  readonly binding: string;
}

export const DEFAULT_LAUNCHERS: ReadonlyArray<DefaultLauncher> = [
  { type: "terminal", name: "Launch Terminal", binding: "<Super>Return" },
  { type: "file_manager", name: "Launch Files", binding: "<Super>e" },
  { type: "browser", name: "Launch Browser", binding: "<Super>b" },
  { type: "music", name: "Launch Music", binding: "<Super>p" },
];

export type LauncherSetup = Data.TaggedEnum<{
  Added: { readonly type: LauncherType; readonly command: string; readonly path: string };
  Updated: { readonly type: LauncherType; readonly command: string; readonly path: string };
  Failed: { readonly type: LauncherType; readonly command: string };
  NotFound: { readonly type: LauncherType };
}>;

export const LauncherSetup = Data.taggedEnum<LauncherSetup>();

const candidateCommand = Effect.fn("Launchers.candidate")(function* (candidate: AppCandidate) {
  const locator = yield* AppLocator;
  if ("flatpak" in candidate) {
    const info = yield* locator.output("flatpak", ["info", candidate.flatpak]);
    return Option.as(info, `flatpak run ${candidate.flatpak}`);
  }
  if ("binary" in candidate) {
    return (yield* locator.hasBinary(candidate.binary)) ? Option.some(candidate.command) : Option.none();
  }

  const answer = yield* locator.output(candidate.query.command, candidate.query.args);
  if (Option.isNone(answer)) {
    return Option.none<string>();
  }
  const handler = answer.value.toLowerCase();
  for (const entry of candidate.matches) {
    if (!handler.includes(entry.match)) {
      continue;
    }
    if (entry.binary === undefined || (yield* locator.hasBinary(entry.binary))) {
      return Option.some(entry.command);
    }
  }
  return Option.none<string>();
});

/** Command for the preferred installed app of a kind; candidates are tried in order, first hit wins. */
export const detectLauncherCommand = Effect.fn("Launchers.detect")(function* (
  desktop: Exclude<DesktopEnvironment, "unknown">,
  type: DefaultLauncherType,
) {
  for (const candidate of LAUNCHER_APPS[desktop][type]) {
    const command = yield* candidateCommand(candidate);
    if (Option.isSome(command)) {
      return command;
    }
  }
  return Option.none<string>();
});

/**
 * Points one launcher per default kind at the detected app. A launcher with the
 * default name, or else one that looks like the same kind, is updated in place.
 */
export const setupDefaultLaunchers = Effect.fn("Launchers.setupDefaults")(function* () {
  const backend = yield* ShortcutsBackend;
  const results: Array<LauncherSetup> = [];

  for (const launcher of DEFAULT_LAUNCHERS) {
    const detected = yield* detectLauncherCommand(backend.desktop, launcher.type);
    if (Option.isNone(detected)) {
      results.push(LauncherSetup.NotFound({ type: launcher.type }));
      continue;
    }
    const command = detected.value;

    const customs = yield* backend.getCustomKeybindings();
    const existing = findCustomKeybinding(customs, launcher.name).pipe(
      Option.orElse(() => findCustomKeybindingByType(customs, launcher.type)),
    );

    if (Option.isSome(existing)) {
      const path = existing.value.path;
      const updated = yield* backend.updateCustomKeybinding(path, {
        command,
        binding: launcher.binding,
      });
      results.push(
        updated
          ? LauncherSetup.Updated({ type: launcher.type, command, path })
          : LauncherSetup.Failed({ type: launcher.type, command }),
      );
      continue;
    }

    const added = yield* backend.addCustomKeybinding(launcher.name, command, launcher.binding);
    results.push(
      Option.match(added, {
        onNone: () => LauncherSetup.Failed({ type: launcher.type, command }),
        onSome: (path) => LauncherSetup.Added({ type: launcher.type, command, path }),
      }),
    );
  }

  yield* Effect.logInfo("Set up default launchers", {
    results: results.map((result) => `${result.type}: ${result._tag}`),
  });
  return results;
});
