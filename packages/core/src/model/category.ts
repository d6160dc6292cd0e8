export interface ShortcutCategory {
  readonly id: string;
  readonly name: string;
  readonly icon: string;
  readonly description: string;
}

export const CUSTOM_CATEGORY_ID = "custom";
