/*eslint-disable @typescript-eslint/no-explicit-any */
//https://github.com/microsoft/TypeScript/issues/57226
//axe's published declarations do not resolve under NodeNext, so this ambient
//declaration takes their place. Only the surface used by the logger package is described.
declare module "axe" {
  const Axe: AxeClass;

  type AxeClass = new <TLogger extends Axe.Logger = Console>(
    config?: Axe.Options<TLogger>,
  ) => Prototype & LoggerMethods & LoggerMethodAliases;

  type LoggerMethods = {
    [K in BaseLevels]: LoggerMethod;
  };

  export type BaseLevels =
    | "trace"
    | "debug"
    | "info"
    | "warn"
    | "error"
    | "fatal";

  export interface LoggerMethodAliases {
    err: LoggerMethods["error"];
    warning: LoggerMethods["warn"];
  }

  export interface Prototype {
    log: (...args: any[]) => Promise<void>;
    setLevel(level: string): void;
    getNormalizedLevel(level: string): string;
    setName(name: string): void;
    pre(level: string, fn: PreHook): void;
    post(level: string, fn: PostHook): void;
    config: {
      version: string;
      levels: string[];
    };
  }

  export type LoggerMethod = (...args: any[]) => Promise<void>;

  /**
   * Runs before a logger method; returns the (possibly rewritten) error, message and meta.
   */
  export type PreHook = (
    method: string,
    err: unknown,
    message: unknown,
    meta: Record<string, unknown>,
  ) => [unknown, unknown, Record<string, unknown>];

  /**
   * Runs after a logger method has been invoked.
   */
  export type PostHook = (
    method: string,
    err: unknown,
    message: unknown,
    meta: Record<string, unknown>,
  ) => PromiseLike<void> | void;

  namespace Axe {
    // any object with at least an `info` or a `log` method
    export type Logger =
      | { info: (...args: any[]) => void; log?: (...args: any[]) => void }
      | { log: (...args: any[]) => void; info?: (...args: any[]) => void };

    export interface Options<TLogger extends Logger> {
      /**
       * Pass Error messages to the underlying logger as the Error itself (with its stack).
       * Overridden by `AXE_SHOW_STACK`.
       *
       * @default true
       */
      showStack?: boolean;

      meta?: {
        /** Whether metadata is passed to the underlying logger at all. @default true */
        show?: boolean;
        /** Dot-notation paths removed from metadata. @default [] */
        omittedFields?: string[];
        /** Dot-notation paths kept from metadata, applied after omission. @default [] */
        pickedFields?: (string | symbol)[];
      };

      /**
       * Skip invoking the underlying logger; hooks still run.
       *
       * @default false
       */
      silent?: boolean;

      /**
       * The underlying logger (console, pino, winston, ...).
       *
       * @default console
       */
      logger?: TLogger;

      /** Name set on the underlying logger. */
      name?: string | boolean;

      /**
       * Lowest level that is written.
       *
       * @default 'info'
       */
      level?: string;

      /** Levels that are supported at all. */
      levels?: string[];

      /**
       * Attach application information to metadata. Overridden by `AXE_APP_INFO`.
       *
       * @default true
       */
      appInfo?: boolean;

      hooks?: {
        pre?: PreHook[];
        post?: PostHook[];
      };
    }
  }

  export default Axe;
}
