import pino from "pino";

/**
 * Creates the application's pino logger: JSON lines on stdout with string
 * level labels, ISO timestamps and an `app` binding on every record.
 *
 * Level comes from the argument, then `LOG_LEVEL`, then `info`.
 * Tests pass a `destination` to capture output.
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "feedsmith",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { app: "feedsmith", pid: process.pid },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    serializers: { err: pino.stdSerializers.err },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
