import { Data } from "effect";

import { hasModifier, type ModifierName, type Modifiers } from "./modifier";

/**
 * A logical key plus a modifier set. Equality is structural, so two bindings
 * parsed from differently ordered accelerator text compare equal with `Equal.equals`
 * and hash identically inside `HashSet`.
 */
export class KeyBinding extends Data.Class<{
  readonly key: string;
  readonly modifiers: Modifiers;
}> {
  has(name: ModifierName): boolean {
    return hasModifier(this.modifiers, name);
  }
}
