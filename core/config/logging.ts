import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // Used when neither LOG_LEVEL nor RPYFMT_DEBUG is set
  defaultLevel: 'warn',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Optional JSON log file, enabled through RPYFMT_LOG_FILE
  file: {
    envVar: 'RPYFMT_LOG_FILE',
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  services: {
    scanner: { level: 'warn' },
    extractor: { level: 'warn' },
    dispatch: { level: 'warn' },
    engine: { level: 'warn' },
    splice: { level: 'warn' },
    pipeline: { level: 'warn' },
    config: { level: 'warn' },
    cli: { level: 'warn' }
  }
} as const;

export type ServiceName = keyof typeof loggingConfig.services;
