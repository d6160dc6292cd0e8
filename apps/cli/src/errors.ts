import { Schema } from "effect";

/** A command could not do what it was asked; the message is shown to the user. */
export class CliError extends Schema.TaggedError<CliError>()("CliError", {
  message: Schema.String,
  operation: Schema.String,
  cause: Schema.optional(Schema.Defect),
}) {}
