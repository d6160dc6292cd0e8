// Modifier bitset shared by every adapter.

export const Modifier = {
  None: 0,
  Control: 1 << 0,
  Shift: 1 << 1,
  Alt: 1 << 2,
  Super: 1 << 3,
  Hyper: 1 << 4,
  Meta: 1 << 5,
} as const;

export type ModifierName = Exclude<keyof typeof Modifier, "None">;

/** A set of modifiers encoded as the bitwise OR of {@link Modifier} flags. */
export type Modifiers = number;

/** Order in which modifiers are printed in canonical accelerator text. */
export const MODIFIER_ORDER: ReadonlyArray<ModifierName> = [
  "Control",
  "Shift",
  "Alt",
  "Super",
  "Hyper",
  "Meta",
];

export const ALL_MODIFIERS: Modifiers = MODIFIER_ORDER.reduce<number>(
  (mask, name) => mask | Modifier[name],
  Modifier.None,
);

export const combineModifiers = (...names: ReadonlyArray<ModifierName>): Modifiers =>
  names.reduce<number>((mask, name) => mask | Modifier[name], Modifier.None);

export const hasModifier = (modifiers: Modifiers, name: ModifierName): boolean =>
  (modifiers & Modifier[name]) !== 0;

export const modifierNames = (modifiers: Modifiers): Array<ModifierName> =>
  MODIFIER_ORDER.filter((name) => hasModifier(modifiers, name));
