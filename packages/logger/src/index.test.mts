import { EventEmitter } from "node:events";
import * as workerThreads from "node:worker_threads";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
  forwardWorkerLogs,
  isWorkerLogRecord,
  loggerFactory,
} from "./index.mjs";

import type { BaseLogger } from "./index.mjs";

const threadState = vi.hoisted(() => ({ isMainThread: true }));

vi.mock("node:worker_threads", () => ({
  get isMainThread() {
    return threadState.isMainThread;
  },
  threadId: 7,
  parentPort: { postMessage: vi.fn() },
}));

const recordingLogger = (): BaseLogger => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
});

describe("loggerFactory", () => {
  afterEach(() => {
    threadState.isMainThread = true;
    vi.clearAllMocks();
  });

  it("should create a logger and the underlying axe instance", () => {
    const { logger, axeLogger } = loggerFactory({});
    expect(logger).toBeDefined();
    expect(axeLogger).toBeDefined();
  });

  it("should have all logger methods defined", () => {
    const { logger } = loggerFactory();
    expect(logger.trace).toBeTypeOf("function");
    expect(logger.debug).toBeTypeOf("function");
    expect(logger.info).toBeTypeOf("function");
    expect(logger.warn).toBeTypeOf("function");
    expect(logger.error).toBeTypeOf("function");
    expect(logger.fatal).toBeTypeOf("function");
  });

  it("should route every level through logMessage", () => {
    const { logger } = loggerFactory({ silent: true });
    const spy = vi.spyOn(logger, "logMessage");

    logger.warn("disk almost full", { free: 10 });
    logger.fatal(new Error("boom"));

    expect(spy).toHaveBeenNthCalledWith(1, "warn", "disk almost full", { free: 10 });
    expect(spy).toHaveBeenNthCalledWith(2, "fatal", new Error("boom"), undefined);
  });

  it("should write through axe in the main thread", () => {
    const { logger, axeLogger } = loggerFactory({ silent: true });
    const spy = vi.spyOn(axeLogger, "info").mockResolvedValue(undefined);

    logger.info("test message", { key: "value" });

    expect(spy).toHaveBeenCalledWith("test message", { key: "value" });
    expect(workerThreads.parentPort?.postMessage).not.toHaveBeenCalled();
  });

  it("should hand axe a copy of the caller's meta", async () => {
    const { logger } = loggerFactory({ silent: true });
    const meta = { key: "value" };

    logger.info("test message", meta);
    await new Promise((resolve) => setImmediate(resolve));

    expect(meta).toEqual({ key: "value" });
  });

  it("should post a log record to the parent port in worker threads", () => {
    threadState.isMainThread = false;
    const { logger, axeLogger } = loggerFactory({});
    const spy = vi.spyOn(axeLogger, "info");

    logger.info("test message", { key: "value" });

    expect(workerThreads.parentPort?.postMessage).toHaveBeenCalledWith({
      type: "log",
      threadId: 7,
      level: "info",
      message: "test message",
      meta: { key: "value" },
    });
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("isWorkerLogRecord", () => {
  it("should accept a record posted by a worker", () => {
    expect(
      isWorkerLogRecord({ type: "log", threadId: 1, level: "warn", message: "slow" }),
    ).toBe(true);
    expect(
      isWorkerLogRecord({ type: "log", threadId: 1, level: "error", message: new Error("x") }),
    ).toBe(true);
  });

  it("should reject other messages", () => {
    expect(isWorkerLogRecord(null)).toBe(false);
    expect(isWorkerLogRecord("log")).toBe(false);
    expect(isWorkerLogRecord({ type: "progress", level: "info", message: "50%" })).toBe(false);
    expect(isWorkerLogRecord({ type: "log", level: "verbose", message: "x" })).toBe(false);
    expect(isWorkerLogRecord({ type: "log", level: "info", message: 42 })).toBe(false);
  });
});

describe("forwardWorkerLogs", () => {
  it("should write worker records through the logger with the thread id", () => {
    const worker = new EventEmitter();
    const logger = recordingLogger();
    forwardWorkerLogs(worker, logger);

    worker.emit("message", {
      type: "log",
      threadId: 3,
      level: "warn",
      message: "retrying",
      meta: { attempt: 2 },
    });

    expect(logger.warn).toHaveBeenCalledWith("retrying", { attempt: 2, threadId: 3 });
  });

  it("should ignore messages that are not log records", () => {
    const worker = new EventEmitter();
    const logger = recordingLogger();
    forwardWorkerLogs(worker, logger);

    worker.emit("message", { type: "result", value: 1 });

    expect(logger.info).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("should stop forwarding once the returned function is called", () => {
    const worker = new EventEmitter();
    const logger = recordingLogger();
    const stop = forwardWorkerLogs(worker, logger);

    stop();
    worker.emit("message", { type: "log", threadId: 3, level: "info", message: "done" });

    expect(logger.info).not.toHaveBeenCalled();
    expect(worker.listenerCount("message")).toBe(0);
  });
});
