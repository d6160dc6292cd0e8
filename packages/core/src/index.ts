export * from "./model/modifier";
export * from "./model/binding";
export * from "./model/category";
export * from "./model/shortcut";
export * from "./model/keyboard";
export * from "./model/profile";

export * from "./accelerator/codec";
export { keyGlyph, keyLabel, resolveKeyName } from "./accelerator/keysyms";

export * from "./backend/backend";
export * from "./backend/bindings";
export * from "./backend/conflicts";
export * from "./backend/custom";
export * from "./backend/detection";
export * from "./backend/errors";
export * from "./backend/factory";

export * as Gnome from "./gnome/backend";
export * as GnomeClassify from "./gnome/classify";
export { GSettingsClient, type GSettingsKey, relocatable } from "./gnome/client";
export { GVariant, formatGVariant, gvariantStrings, parseGVariant } from "./gnome/gvariant";

export * as Kde from "./kde/backend";
export * as KdeAccelerator from "./kde/accelerator";
export { KConfigFile } from "./kde/kconfig";
export { ShortcutDaemon } from "./kde/daemon";

export * from "./hardware/keyboard";
export * from "./hardware/mac";

export * from "./launchers/defaults";
export { AppLocator } from "./launchers/locator";

export * from "./profiles/errors";
export * from "./profiles/format";
export * from "./profiles/store";
export * from "./profiles/service";

export * from "./config";
