import bunyan from "bunyan";

const LOG_LEVELS: readonly bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Returns `value` when it names a bunyan level, otherwise `fallback`. */
export function parseLogLevel(
  value: string | undefined,
  fallback: bunyan.LogLevelString
): bunyan.LogLevelString {
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

export default {
  logLevel: parseLogLevel(process.env.LOG_LEVEL, "warn"),
};
