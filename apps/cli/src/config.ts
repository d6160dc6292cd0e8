import { Config, LogLevel } from "effect";

const colorsDisabled = Config.all({
  noColor: Config.string("NO_COLOR").pipe(Config.withDefault("")),
  forceColor: Config.string("FORCE_COLOR").pipe(Config.withDefault("")),
}).pipe(
  Config.map(({ noColor, forceColor }) => {
    const force = forceColor.toLowerCase();
    return noColor !== "" || force === "0" || force === "false";
  }),
);

export const loggingConfig = Config.all({
  logLevel: Config.logLevel("KEYSYNC_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
  noColor: colorsDisabled,
});
