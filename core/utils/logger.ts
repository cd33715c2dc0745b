import winston from 'winston';
import { loggingConfig, type ServiceName } from '@core/config/logging';

export interface ILoggerFactory {
  createServiceLogger(serviceName: ServiceName): winston.Logger;
}

winston.addColors(loggingConfig.colors);

const allLevels = Object.keys(loggingConfig.levels);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    if (process.env.RPYFMT_DEBUG !== 'true') {
      return `${level}: ${String(message)}`;
    }

    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

const isSilentTest = () =>
  process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL;

const resolveLevel = (fallback: string): string => {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }
  if (process.env.RPYFMT_DEBUG === 'true') {
    return 'debug';
  }
  return fallback;
};

// stdout carries formatted documents, so every level goes to stderr
const buildTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [];
  if (!isSilentTest()) {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: allLevels
      })
    );
  }

  const logFile = process.env[loggingConfig.file.envVar];
  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        format: fileFormat,
        maxsize: loggingConfig.file.maxSize,
        maxFiles: loggingConfig.file.maxFiles,
        tailable: loggingConfig.file.tailable
      })
    );
  }

  // winston warns when a logger writes with no transport at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }
  return transports;
};

/**
 * Factory for service-scoped Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  createServiceLogger(serviceName: ServiceName): winston.Logger {
    const serviceConfig = loggingConfig.services[serviceName];
    return winston.createLogger({
      level: resolveLevel(serviceConfig.level),
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      transports: buildTransports()
    });
  }
}

export const loggerFactory = new LoggerFactory();

export const logger = winston.createLogger({
  level: resolveLevel(loggingConfig.defaultLevel),
  levels: loggingConfig.levels,
  transports: buildTransports()
});

export function createServiceLogger(serviceName: ServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

/**
 * Applies a CLI verbosity choice to every service logger at once.
 */
export function setLogLevel(level: string): void {
  for (const target of [logger, ...serviceLoggers]) {
    target.level = level;
    target.transports.forEach(transport => {
      transport.level = level;
    });
  }
}

export const scannerLogger = createServiceLogger('scanner');
export const extractorLogger = createServiceLogger('extractor');
export const dispatchLogger = createServiceLogger('dispatch');
export const engineLogger = createServiceLogger('engine');
export const spliceLogger = createServiceLogger('splice');
export const pipelineLogger = createServiceLogger('pipeline');
export const configLogger = createServiceLogger('config');
export const cliLogger = createServiceLogger('cli');

const serviceLoggers = [
  scannerLogger,
  extractorLogger,
  dispatchLogger,
  engineLogger,
  spliceLogger,
  pipelineLogger,
  configLogger,
  cliLogger
];

export default logger;
