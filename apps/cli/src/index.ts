#!/usr/bin/env tsx
import { ValidationError } from "@effect/cli";
import { NodeRuntime } from "@effect/platform-node";
import { Cause, Effect, Option } from "effect";

import { cli } from "~/cli";
import { AppLive } from "~/layers";
import { CliLoggerLive } from "~/logging/logger";

// @effect/cli prints its own usage errors
const isUsageError = (cause: Cause.Cause<unknown>) =>
  Option.exists(Cause.failureOption(cause), ValidationError.isValidationError);

const main = Effect.suspend(() => cli(process.argv)).pipe(
  Effect.tapErrorCause((cause) =>
    isUsageError(cause) ? Effect.void : Effect.logError("Command failed", cause),
  ),
  Effect.provide(AppLive),
  Effect.provide(CliLoggerLive),
);

NodeRuntime.runMain(main, { disableErrorReporting: true });
