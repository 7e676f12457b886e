import pino from "pino";

const isDev = process.env.NODE_ENV === "development";
const logLevel = process.env.LOG_LEVEL || (isDev ? "debug" : "info");

// Juju collects hook stderr into the unit log
export const logger = isDev
  ? pino({
      level: logLevel,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    })
  : pino({ level: logLevel }, pino.destination(2));

/**
 * Logger for the detached watcher process. Its stdout is the watchdog log file.
 */
export function createWatcherLogger() {
  return pino({ level: logLevel, name: "config-dir-watcher" });
}

export default logger;
