export const KEYBOARD_TYPES = {
  "ansi-104": { name: "ANSI 104 (full size)", apple: false, iso: false },
  "ansi-87": { name: "ANSI 87 (tenkeyless)", apple: false, iso: false },
  "ansi-60": { name: "ANSI 60%", apple: false, iso: false },
  "iso-105": { name: "ISO 105 (full size)", apple: false, iso: true },
  "mac-ansi": { name: "Mac ANSI", apple: true, iso: false },
  "mac-iso": { name: "Mac ISO", apple: true, iso: true },
} as const;

export type KeyboardType = keyof typeof KEYBOARD_TYPES;

export const keyboardTypeName = (type: KeyboardType): string => KEYBOARD_TYPES[type].name;
export const isAppleKeyboard = (type: KeyboardType): boolean => KEYBOARD_TYPES[type].apple;
export const isIsoKeyboard = (type: KeyboardType): boolean => KEYBOARD_TYPES[type].iso;

/** XKB option tokens carried by a profile; each is passed through untouched. */
export interface XkbOptions {
  readonly capsLock?: string;
  readonly altWin?: string;
  readonly compose?: string;
  readonly numpad?: string;
}

export const xkbOptionList = (options: XkbOptions): Array<string> =>
  [options.capsLock, options.altWin, options.compose, options.numpad].filter(
    (option): option is string => option !== undefined && option.length > 0,
  );

export const hasXkbOptions = (options: XkbOptions): boolean => xkbOptionList(options).length > 0;

export type FnMode = "disabled" | "fkeys" | "media";

export const FN_MODES: ReadonlyArray<FnMode> = ["disabled", "fkeys", "media"];

export interface MacKeyboardConfig {
  readonly fnMode: FnMode;
  readonly swapOptCmd: boolean;
  readonly swapFnLeftCtrl: boolean;
  readonly isoLayout: boolean;
}

export const defaultMacKeyboardConfig: MacKeyboardConfig = {
  fnMode: "media",
  swapOptCmd: false,
  swapFnLeftCtrl: false,
  isoLayout: false,
};

const FN_MODE_VALUES: Readonly<Record<FnMode, number>> = { disabled: 0, fkeys: 1, media: 2 };

/** Parameters for the Apple keyboard kernel module. */
export const macModuleOptions = (config: MacKeyboardConfig): Record<string, number> => ({
  fnmode: FN_MODE_VALUES[config.fnMode],
  swap_opt_cmd: config.swapOptCmd ? 1 : 0,
  swap_fn_leftctrl: config.swapFnLeftCtrl ? 1 : 0,
  iso_layout: config.isoLayout ? 1 : 0,
});
