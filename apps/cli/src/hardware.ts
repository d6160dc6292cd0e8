import { MacKeyboardConfigurator, macModuleOptions } from "@keysync/core";
import { Effect, Layer } from "effect";

/** Reports the kernel-module options a profile asks for without touching the system. */
export const MacKeyboardPreview = Layer.succeed(
  MacKeyboardConfigurator,
  MacKeyboardConfigurator.of({
    apply: (config) =>
      Effect.logInfo("Keyboard module options (not applied)", {
        module: "hid_apple",
        options: macModuleOptions(config),
      }),
  }),
);
