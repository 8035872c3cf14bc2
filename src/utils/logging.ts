import pino, { type DestinationStream, type Logger } from 'pino';
import { Writable } from 'stream';
import { loadSettings, type LogLevel } from '../config/settings.js';

let loggerInstance: Logger | null = null;

// stdout carries the generated document, so logs always go to stderr
export function getLogger(): Logger {
  if (!loggerInstance) {
    const settings = loadSettings();
    loggerInstance = settings.logPretty
      ? pino({
          level: settings.logLevel,
          transport: { target: 'pino-pretty', options: { destination: 2 } },
        })
      : pino({ level: settings.logLevel }, pino.destination({ dest: 2, sync: true }));
  }
  return loggerInstance;
}

/** Child logger tagged with the component that emits it. */
export function getComponentLogger(component: string): Logger {
  return getLogger().child({ component });
}

export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}

/** Attach bindings (e.g. a run id) to every log line emitted from now on. */
export function bindLogContext(bindings: Record<string, string>): void {
  loggerInstance = getLogger().child(bindings);
}

// Test-only helper to reset singleton
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Route all log lines into memory, one JSON string per entry
export function __enableTestLogCollector(level: LogLevel = 'debug'): string[] {
  const logs: string[] = [];
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  const destination: DestinationStream = sink;
  loggerInstance = pino({ level }, destination);
  return logs;
}
