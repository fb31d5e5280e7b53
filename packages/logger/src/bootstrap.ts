import { getLogLevel, isConsoleLoggingEnabled } from '@iso10962/env';

import { initLogger, type Sink } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

/**
 * Configure the global logger from CFI_LOG_LEVEL and CFI_LOG_CONSOLE.
 * Extra sinks are attached after the console sink.
 */
export function initLoggerFromEnv(extraSinks: Sink[] = []): void {
  const sinks: Sink[] = isConsoleLoggingEnabled() ? [new ConsoleSink(), ...extraSinks] : [...extraSinks];
  initLogger({ level: getLogLevel(), sinks });
}
