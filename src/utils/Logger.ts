import path from "path";
import winston, { format } from "winston";
import Transport from "winston-transport";

const { combine, timestamp, colorize, printf } = winston.format;

const DEFAULT_LOGGER_ID = "rubber-band";

const enumerateErrorFormat = winston.format((info) => {
  if (info instanceof Error) {
    return Object.assign(
      {
        message: info.message,
        stack: info.stack,
      },
      info
    );
  }

  return info;
});

const file = (thisModule?: NodeJS.Module) =>
  format((info) => {
    if (!thisModule) {
      return info;
    }
    const BASE_PATH = path.resolve(".");
    const moduleName = thisModule.filename.split(BASE_PATH)[1] ?? thisModule.filename;
    return { ...info, moduleName };
  });

function loggerId(thisModule?: NodeJS.Module): string {
  return thisModule?.filename ?? DEFAULT_LOGGER_ID;
}

export function getLogger(thisModule?: NodeJS.Module): winston.Logger {
  const id = loggerId(thisModule);
  if (!winston.loggers.has(id)) {
    createLogger(id, thisModule);
  }

  return winston.loggers.get(id);
}

function createLogger(id: string, thisModule?: NodeJS.Module) {
  winston.loggers.add(id, {
    level: process.env.LOG_LEVEL || "info",
    format: winston.format.combine(timestamp(), enumerateErrorFormat()),
    transports: _createConsoleTransport(thisModule),
  });
}

function _createConsoleTransport(thisModule?: NodeJS.Module): Transport {
  return new winston.transports.Console({
    format: combine(
      colorize(),
      file(thisModule)(),
      printf(
        (info) =>
          `[${String(info.timestamp)}] ${info.level}  [${String(info.moduleName ?? DEFAULT_LOGGER_ID)}]: ${String(
            info.message
          )} ${info.stack ? `\n${String(info.stack)}` : ""}`
      )
    ),
    stderrLevels: ["error"],
  });
}
