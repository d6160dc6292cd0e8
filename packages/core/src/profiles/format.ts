import { Effect, ParseResult, Schema } from "effect";
import { parse, stringify } from "smol-toml";

import {
  defaultMacKeyboardConfig,
  FN_MODES,
  type FnMode,
  hasXkbOptions,
  type MacKeyboardConfig,
  type XkbOptions,
} from "../model/keyboard";
import { makeProfile, type Profile } from "../model/profile";

import { ProfileFormatError } from "./errors";

// Hand-written files may use bare TOML datetimes instead of ISO strings
const Timestamp = Schema.Union(Schema.DateFromSelf, Schema.Date);

const ProfileSection = Schema.Struct({
  name: Schema.optional(Schema.String),
  description: Schema.optional(Schema.String),
  author: Schema.optional(Schema.String),
  version: Schema.optional(Schema.Union(Schema.String, Schema.Number)),
  created: Schema.optional(Timestamp),
  modified: Schema.optional(Timestamp),
});

const XkbSection = Schema.Struct({
  caps_lock: Schema.optional(Schema.String),
  alt_win: Schema.optional(Schema.String),
  compose: Schema.optional(Schema.String),
  numpad: Schema.optional(Schema.String),
});

const MacKeyboardSection = Schema.Struct({
  fn_mode: Schema.optional(Schema.String),
  swap_opt_cmd: Schema.optional(Schema.Boolean),
  swap_fn_leftctrl: Schema.optional(Schema.Boolean),
  iso_layout: Schema.optional(Schema.Boolean),
});

export const ProfileDocument = Schema.Struct({
  profile: Schema.optional(ProfileSection),
  shortcuts: Schema.optional(
    Schema.Record({ key: Schema.String, value: Schema.Array(Schema.String) }),
  ),
  xkb: Schema.optional(XkbSection),
  mac_keyboard: Schema.optional(MacKeyboardSection),
  metadata: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
});

export type ProfileDocument = typeof ProfileDocument.Type;

const isFnMode = (value: string): value is FnMode => FN_MODES.some((mode) => mode === value);

const toMacKeyboard = (section: typeof MacKeyboardSection.Type): MacKeyboardConfig => ({
  // Unknown modes fall back to media keys
  fnMode:
    section.fn_mode !== undefined && isFnMode(section.fn_mode)
      ? section.fn_mode
      : defaultMacKeyboardConfig.fnMode,
  swapOptCmd: section.swap_opt_cmd ?? false,
  swapFnLeftCtrl: section.swap_fn_leftctrl ?? false,
  isoLayout: section.iso_layout ?? false,
});

const toXkb = (section: typeof XkbSection.Type): XkbOptions => ({
  ...(section.caps_lock ? { capsLock: section.caps_lock } : {}),
  ...(section.alt_win ? { altWin: section.alt_win } : {}),
  ...(section.compose ? { compose: section.compose } : {}),
  ...(section.numpad ? { numpad: section.numpad } : {}),
});

// TOML datetimes decode to a Date subclass that prints differently
const plainDate = (date: Date): Date => new Date(date.getTime());

export const documentToProfile = (
  document: ProfileDocument,
  fallbackName: string,
  now: Date,
): Profile =>
  makeProfile(
    {
      name: document.profile?.name ?? fallbackName,
      description: document.profile?.description ?? "",
      author: document.profile?.author ?? "",
      version: String(document.profile?.version ?? "1.0"),
      created: plainDate(document.profile?.created ?? now),
      modified: plainDate(document.profile?.modified ?? now),
      shortcuts: document.shortcuts ?? {},
      xkb: document.xkb === undefined ? {} : toXkb(document.xkb),
      ...(document.mac_keyboard === undefined
        ? {}
        : { macKeyboard: toMacKeyboard(document.mac_keyboard) }),
      metadata: document.metadata ?? {},
    },
    now,
  );

export const profileToDocument = (profile: Profile): Record<string, unknown> => {
  const document: Record<string, unknown> = {
    profile: {
      name: profile.name,
      description: profile.description,
      author: profile.author,
      version: profile.version,
      created: profile.created.toISOString(),
      modified: profile.modified.toISOString(),
    },
    shortcuts: profile.shortcuts,
  };

  if (hasXkbOptions(profile.xkb)) {
    document["xkb"] = {
      ...(profile.xkb.capsLock ? { caps_lock: profile.xkb.capsLock } : {}),
      ...(profile.xkb.altWin ? { alt_win: profile.xkb.altWin } : {}),
      ...(profile.xkb.compose ? { compose: profile.xkb.compose } : {}),
      ...(profile.xkb.numpad ? { numpad: profile.xkb.numpad } : {}),
    };
  }

  if (profile.macKeyboard !== undefined) {
    document["mac_keyboard"] = {
      fn_mode: profile.macKeyboard.fnMode,
      swap_opt_cmd: profile.macKeyboard.swapOptCmd,
      swap_fn_leftctrl: profile.macKeyboard.swapFnLeftCtrl,
      iso_layout: profile.macKeyboard.isoLayout,
    };
  }

  if (Object.keys(profile.metadata).length > 0) {
    document["metadata"] = profile.metadata;
  }
  return document;
};

/** Parses and validates profile TOML. `source` names the file in errors. */
export const decodeProfile = (
  text: string,
  source: string,
  fallbackName: string,
  now: Date = new Date(),
): Effect.Effect<Profile, ProfileFormatError> =>
  Effect.try({
    try: () => parse(text),
    catch: (cause) =>
      new ProfileFormatError({ path: source, message: `Invalid TOML in ${source}`, cause }),
  }).pipe(
    Effect.flatMap((raw) =>
      Schema.decodeUnknown(ProfileDocument)(raw).pipe(
        Effect.mapError(
          (error) =>
            new ProfileFormatError({
              path: source,
              message: ParseResult.TreeFormatter.formatErrorSync(error),
            }),
        ),
      ),
    ),
    Effect.map((document) => documentToProfile(document, fallbackName, now)),
  );

export const encodeProfile = (profile: Profile): string => stringify(profileToDocument(profile));
