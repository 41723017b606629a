import Axe from "axe";
import { isMainThread, parentPort, threadId } from "node:worker_threads";

import type { EventEmitter } from "node:events";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export type Logger = BaseLogger & {
  logMessage: (
    level: LoggerLevels,
    message: LoggerMessage,
    meta?: LoggerMeta,
  ) => void;
};

/**
 * What a worker thread posts to its parent instead of writing a log line.
 */
export interface WorkerLogRecord {
  type: "log";
  threadId: number;
  level: LoggerLevels;
  message: LoggerMessage;
  meta?: LoggerMeta;
}

export type LoggerFactoryOptions = Axe.Options<Axe.Logger>;

const LEVELS: readonly string[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] satisfies LoggerLevels[];

const isLevel = (value: unknown): value is LoggerLevels =>
  typeof value === "string" && LEVELS.includes(value);

export const isWorkerLogRecord = (value: unknown): value is WorkerLogRecord =>
  typeof value === "object" &&
  value !== null &&
  "type" in value &&
  value.type === "log" &&
  "level" in value &&
  isLevel(value.level) &&
  "message" in value &&
  (typeof value.message === "string" || value.message instanceof Error);

/**
 * Creates a logger usable from the main thread and from worker threads.
 * In a worker, records are posted to the parent port; see {@link forwardWorkerLogs}.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const axeLogger = new Axe(options);

  const logger: Logger = {
    logMessage(level, message, meta) {
      if (!isMainThread) {
        const record: WorkerLogRecord = {
          type: "log",
          threadId,
          level,
          message,
          meta,
        };
        //meta must survive the structured clone algorithm
        parentPort?.postMessage(record);

        return;
      }
      // axe adds its own keys (app info) to the meta object it is given
      void axeLogger[level](message, meta === undefined ? undefined : { ...meta });
    },
    trace(message, meta) {
      this.logMessage("trace", message, meta);
    },
    debug(message, meta) {
      this.logMessage("debug", message, meta);
    },
    info(message, meta) {
      this.logMessage("info", message, meta);
    },
    warn(message, meta) {
      this.logMessage("warn", message, meta);
    },
    error(message, meta) {
      this.logMessage("error", message, meta);
    },
    fatal(message, meta) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, axeLogger };
};

/**
 * Writes the records a worker posts through `logger`, tagging each with the worker's `threadId`.
 * Other messages from the worker are ignored.
 *
 * @returns a function that stops forwarding
 *
 * @example
 * ```ts
 * const worker = new Worker(new URL("./job.mjs", import.meta.url));
 * const stop = forwardWorkerLogs(worker, logger);
 * ```
 */
export const forwardWorkerLogs = (
  worker: Pick<EventEmitter, "on" | "off">,
  logger: BaseLogger,
): (() => void) => {
  const handleMessage = (data: unknown) => {
    if (!isWorkerLogRecord(data)) {
      return;
    }
    logger[data.level](data.message, { ...data.meta, threadId: data.threadId });
  };

  worker.on("message", handleMessage);

  return () => {
    worker.off("message", handleMessage);
  };
};

export default loggerFactory;
