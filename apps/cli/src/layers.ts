import { NodeContext } from "@effect/platform-node";
import {
  AppLocator,
  KeyboardHardware,
  ProfileServiceLive,
  ProfileStoreLive,
  SessionBus,
  ShortcutsBackendLive,
} from "@keysync/core";
import { Layer } from "effect";

import { MacKeyboardPreview } from "~/hardware";

const CoreLive = ProfileServiceLive.pipe(
  Layer.provideMerge(Layer.mergeAll(ShortcutsBackendLive, ProfileStoreLive)),
);

/** Everything the commands need, on top of Node's platform services. */
export const AppLive = Layer.mergeAll(
  CoreLive,
  SessionBus.Live,
  AppLocator.Live,
  KeyboardHardware.FromConfig,
  MacKeyboardPreview,
).pipe(Layer.provideMerge(NodeContext.layer));
