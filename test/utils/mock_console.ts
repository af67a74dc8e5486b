import { HashMap, Logger } from "effect";
import type * as LogLevel from "effect/LogLevel";

interface LogEntry {
  readonly level: LogLevel.LogLevel;
  readonly message: string;
  readonly annotations: HashMap.HashMap<string, unknown>;
  readonly spans: ReadonlyArray<string>;
}

// Effect.log* hands the logger the array of its arguments
const render = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

/**
 * Creates a mock logger that captures all log output for testing.
 * Use with Effect.provide(mockLoggerLayer) to capture logs in tests.
 */
export const createMockLogger = () => {
  const logs: LogEntry[] = [];
  const messages: string[] = [];

  const mockLogger = Logger.make<unknown, void>(
    ({ message, logLevel, annotations, spans }) => {
      const text = render(message);
      logs.push({
        level: logLevel,
        message: text,
        annotations,
        spans: Array.from(spans).map((span) => span.label),
      });
      messages.push(text);
    }
  );

  const mockLoggerLayer = Logger.replace(Logger.defaultLogger, mockLogger);

  return { mockLoggerLayer, logs, messages };
};
