import { Command } from "@effect/platform";
import { CommandExecutor } from "@effect/platform/CommandExecutor";
import { Config, Context, Effect, Layer, Option } from "effect";

import type { DesktopEnvironment } from "./backend";

const GNOME_CURRENT = ["GNOME", "UNITY", "UBUNTU"];
const KDE_CURRENT = ["KDE", "PLASMA"];
const GNOME_SESSION = ["GNOME", "GNOME-XORG", "GNOME-WAYLAND", "UBUNTU"];
const KDE_SESSION = ["KDE", "PLASMA", "PLASMAWAYLAND"];

export const desktopEnvironmentConfig = Config.all({
  override: Config.option(Config.literal("gnome", "kde")("KEYSYNC_DESKTOP")),
  currentDesktop: Config.string("XDG_CURRENT_DESKTOP").pipe(Config.withDefault("")),
  sessionDesktop: Config.string("XDG_SESSION_DESKTOP").pipe(Config.withDefault("")),
});

/**
 * Classifies the desktop from the XDG session variables alone. `XDG_CURRENT_DESKTOP`
 * may hold several colon-separated names (`ubuntu:GNOME`).
 */
export function desktopFromEnvironment(
  currentDesktop: string,
  sessionDesktop: string,
): DesktopEnvironment {
  const parts = currentDesktop.toUpperCase().split(":");
  if (parts.some((part) => GNOME_CURRENT.includes(part))) {
    return "gnome";
  }
  if (parts.some((part) => KDE_CURRENT.includes(part))) {
    return "kde";
  }

  const session = sessionDesktop.toUpperCase();
  if (GNOME_SESSION.includes(session)) {
    return "gnome";
  }
  if (KDE_SESSION.includes(session)) {
    return "kde";
  }
  return "unknown";
}

/** Asks the session bus whether a well-known name currently has an owner. */
export class SessionBus extends Context.Tag("@keysync/SessionBus")<
  SessionBus,
  {
    readonly nameHasOwner: (name: string) => Effect.Effect<boolean>;
  }
>() {
  static readonly Live = Layer.effect(
    SessionBus,
    Effect.gen(function* () {
      const executor = yield* CommandExecutor;

      const nameHasOwner = (name: string) =>
        executor
          .string(
            Command.make(
              "dbus-send",
              "--session",
              "--print-reply",
              "--reply-timeout=1000",
              "--dest=org.freedesktop.DBus",
              "/org/freedesktop/DBus",
              "org.freedesktop.DBus.NameHasOwner",
              `string:${name}`,
            ),
          )
          .pipe(
            Effect.map((output) => /boolean\s+true/.test(output)),
            Effect.catchAll((error) =>
              Effect.logDebug("Session bus query failed", { name, error: error.message }).pipe(
                Effect.as(false),
              ),
            ),
          );

      return SessionBus.of({ nameHasOwner });
    }),
  );
}

export const detectDesktop = Effect.fn("Desktop.detect")(function* () {
  const config = yield* desktopEnvironmentConfig;
  if (Option.isSome(config.override)) {
    return config.override.value;
  }

  const fromEnvironment = desktopFromEnvironment(config.currentDesktop, config.sessionDesktop);
  if (fromEnvironment !== "unknown") {
    return fromEnvironment;
  }

  const bus = yield* SessionBus;
  if (yield* bus.nameHasOwner("org.gnome.Shell")) {
    return "gnome" as const;
  }
  if (yield* bus.nameHasOwner("org.kde.plasmashell")) {
    return "kde" as const;
  }
  return "unknown" as const;
});
