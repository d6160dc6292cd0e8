import type { CommandExecutor } from "@effect/platform/CommandExecutor";
import type { FileSystem } from "@effect/platform/FileSystem";
import { type ConfigError, Effect, Layer } from "effect";

import { GSettingsClient } from "../gnome/client";
import { GnomeShortcutsBackendLive } from "../gnome/backend";
import { KdeShortcutsBackendLive } from "../kde/backend";
import { ShortcutDaemon } from "../kde/daemon";

import type { DesktopEnvironment, ShortcutsBackend } from "./backend";
import { detectDesktop, SessionBus } from "./detection";

type BackendLayer = Layer.Layer<
  ShortcutsBackend,
  ConfigError.ConfigError,
  CommandExecutor | FileSystem
>;

const BACKENDS: Readonly<Record<Exclude<DesktopEnvironment, "unknown">, BackendLayer>> = {
  gnome: GnomeShortcutsBackendLive.pipe(Layer.provide(GSettingsClient.Live)),
  kde: KdeShortcutsBackendLive.pipe(Layer.provide(ShortcutDaemon.Live)),
};

export const backendLayerFor = (desktop: DesktopEnvironment): BackendLayer =>
  BACKENDS[desktop === "unknown" ? "gnome" : desktop];

/**
 * Picks the adapter once, when the layer is built. Unknown desktops use the
 * GNOME adapter.
 */
export const ShortcutsBackendLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const desktop = yield* detectDesktop();
    if (desktop === "unknown") {
      yield* Effect.logWarning("Could not detect the desktop environment; using the GNOME adapter");
    } else {
      yield* Effect.logDebug("Detected desktop environment", { desktop });
    }
    return backendLayerFor(desktop);
  }),
).pipe(Layer.provide(SessionBus.Live));
