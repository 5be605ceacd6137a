import { loadConfig } from '@csp/config';
import { createPinoLogger, type LoggerPort, type LogLevel } from '@csp/domain';

const ROOT_LOGGER_NAME = 'chain-sync-progress';

let globalRootLogger: LoggerPort | null = null;

export function initializeRootLogger(config: { logLevel?: LogLevel; traceErrors?: boolean }): LoggerPort {
  globalRootLogger = createPinoLogger({
    name: ROOT_LOGGER_NAME,
    level: config.logLevel ?? 'warn',
    traceErrors: config.traceErrors ?? false,
  });
  return globalRootLogger;
}

function initializeFromConfig(): LoggerPort {
  try {
    const { config } = loadConfig();
    return initializeRootLogger({
      logLevel: config.telemetry.logLevel,
      traceErrors: config.telemetry.traceErrors,
    });
  } catch {
    // Config errors surface again when the monitor starts.
    return initializeRootLogger({});
  }
}

export function createChildLogger(name: string): LoggerPort {
  const root = globalRootLogger ?? initializeFromConfig();
  return root.child({ name });
}
