import { Schema } from "effect";

export class ProfileIoError extends Schema.TaggedError<ProfileIoError>()("ProfileIoError", {
  path: Schema.String,
  operation: Schema.Literal("read", "write", "delete", "list"),
  message: Schema.String,
  cause: Schema.optional(Schema.Defect),
}) {}

export class ProfileFormatError extends Schema.TaggedError<ProfileFormatError>()(
  "ProfileFormatError",
  {
    path: Schema.String,
    message: Schema.String,
    cause: Schema.optional(Schema.Defect),
  },
) {}

export class ProfileNotFoundError extends Schema.TaggedError<ProfileNotFoundError>()(
  "ProfileNotFoundError",
  {
    name: Schema.String,
    message: Schema.String,
  },
) {}
