import * as os from "os";
import winston, {Logger} from "winston";
import Transport from "winston-transport";
import {DebugTransport} from "./transports";
import {LoggerConfig} from "./config";

const {combine, timestamp, json, errors} = winston.format;

let loggerInstance: Logger | undefined;

interface Labels extends Record<string, string> {
  readonly app: string;
  readonly env: string;
  readonly version: string;
}

export function createLogger(config: LoggerConfig, labels: Labels): Logger {
  const transports: Transport[] = [];

  // debug transport to stdout if not prod
  if (process.env.NODE_ENV !== 'production') {
    transports.push(new DebugTransport());
  }

  // json file output
  const cJson = config.transports.json;
  if (cJson.enabled) {
    transports.push(new winston.transports.File({
      level: cJson.level,
      filename: cJson.file,
      maxsize: 10 * 1024 * 1024,
    }));
  }

  const addMetadata = winston.format(function (info) {
    info.hostname = os.hostname();
    info.pid = process.pid;
    return info;
  });

  const logger = winston.createLogger({
    format: combine(
      addMetadata(),
      errors({ stack: true }),
      timestamp(),
      json(),
    ),
    defaultMeta: labels,
    level: config.level,
    transports
  });

  loggerInstance = logger;

  return logger;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    throw new Error('Logger not initialized');
  }

  return loggerInstance;
}

export function componentLogger(name: string): Logger {
  return getLogger().child({
    component: name
  });
}
