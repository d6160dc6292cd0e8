import { Schema } from "effect";

export class NativeStoreError extends Schema.TaggedError<NativeStoreError>()("NativeStoreError", {
  store: Schema.String,
  operation: Schema.String,
  message: Schema.String,
  cause: Schema.optional(Schema.Defect),
}) {}
