import {
  configure,
  getConsoleSink,
  type LogLevel,
  parseLogLevel,
} from "@logtape/logtape";

export async function configureLogging(level: LogLevel = "info") {
  await configure({
    sinks: { console: getConsoleSink() },
    loggers: [
      { category: "searchstring", lowestLevel: level, sinks: ["console"] },
      {
        category: ["logtape", "meta"],
        lowestLevel: "warning",
        sinks: ["console"],
      },
    ],
  });
}

export function logLevelFrom(value: string | undefined): LogLevel {
  return value == null || value === "" ? "info" : parseLogLevel(value);
}
