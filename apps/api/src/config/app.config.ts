import type { LogLevel } from '@nestjs/common';

const flag = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined ? fallback : value === 'true' || value === '1';

/**
 * Application configuration
 * Centralized place for runtime settings.
 */
export const appConfig = {
  /** Server port (default 3333) */
  port: parseInt(process.env.PORT || '3333', 10),
  /** Allowed CORS origin */
  corsOrigin: process.env.CORS_ORIGIN || '*',
  /** Node environment */
  nodeEnv: process.env.NODE_ENV || 'development',
  /** Log level threshold */
  logLevel: process.env.LOG_LEVEL || 'log',
  /** Directory that receives exported program packages */
  gcodeOutputDir: process.env.GCODE_OUTPUT_DIR || 'output',
  /** Controller-side directory that subroutine calls point at */
  gcodeBasePath: process.env.GCODE_BASE_PATH || 'C:\\Mach3\\GCode',
  /** Machine travel, inches */
  machineMaxX: parseFloat(process.env.MACHINE_MAX_X || '15'),
  machineMaxY: parseFloat(process.env.MACHINE_MAX_Y || '15'),
  /** Whether the controller runs M98 subroutine calls */
  supportsSubroutines: flag(process.env.SUPPORTS_SUBROUTINES, true),
} as const;

export type AppConfig = typeof appConfig;

const LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/** Every level at or above the threshold; unknown names mean `log`. */
export const logLevels = (threshold: string): LogLevel[] => {
  const index = LEVELS.findIndex((level) => level === threshold);
  return LEVELS.slice(0, index === -1 ? LEVELS.indexOf('log') + 1 : index + 1);
};
