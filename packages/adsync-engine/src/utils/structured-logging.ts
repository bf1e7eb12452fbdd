import * as util from "util";
import { AsyncLocalStorage } from "async_hooks";

export type LogFormat = "text" | "json";

export type Pipeline = "batch" | "stream";

/**
 * What is being synced while a log line is written.
 */
export interface SyncLogContext {
  pipeline: Pipeline;
  table: string;
}

type ConsoleLevel = "log" | "info" | "warn" | "error" | "debug";

const LEVELS: Record<ConsoleLevel, string> = {
  log: "info",
  info: "info",
  warn: "warn",
  error: "error",
  debug: "debug",
};

const syncContextStorage = new AsyncLocalStorage<SyncLogContext>();

let structuredInstalled = false;

/**
 * Runs `fn` with the sync context attached. Console output inside it carries
 * the pipeline and table once structured logging is installed.
 */
export const runWithSyncContext = <T>(
  context: SyncLogContext,
  fn: () => Promise<T>,
): Promise<T> => syncContextStorage.run(context, fn);

export const currentSyncContext = (): SyncLogContext | undefined =>
  syncContextStorage.getStore();

function safeStringify(arg: unknown): string {
  if (typeof arg === "string") {
    return arg;
  }
  if (typeof arg === "object" && arg !== null) {
    // JSON.stringify(new Error("x")) is "{}"
    if (arg instanceof Error) {
      return util.inspect(arg, { depth: 2, breakLength: Infinity });
    }
    try {
      return JSON.stringify(arg);
    } catch {
      return util.inspect(arg, { depth: 2, breakLength: Infinity });
    }
  }
  return util.inspect(arg);
}

export const formatStructuredLine = (
  level: string,
  args: readonly unknown[],
  context: SyncLogContext,
  now: Date = new Date(),
): string =>
  JSON.stringify({
    level,
    message: args.map((arg) => safeStringify(arg)).join(" "),
    pipeline: context.pipeline,
    table: context.table,
    timestamp: now.toISOString(),
  });

/**
 * Wraps a console method: inside a sync context the call becomes one JSON
 * line on stderr, outside it the original method runs unchanged.
 */
export function createStructuredConsoleWrapper(
  originalMethod: (...args: unknown[]) => void,
  level: string,
  write: (line: string) => void = (line) => {
    process.stderr.write(line + "\n");
  },
): (...args: unknown[]) => void {
  return (...args: unknown[]) => {
    const context = syncContextStorage.getStore();
    if (!context) {
      originalMethod(...args);
      return;
    }
    try {
      write(formatStructuredLine(level, args, context));
    } catch {
      originalMethod(...args);
    }
  };
}

/**
 * Installs the JSON console for `format = "json"`. Text format keeps the
 * plain prefixed console.
 */
export function setupStructuredConsole(format: LogFormat): void {
  if (format !== "json" || structuredInstalled) {
    return;
  }
  structuredInstalled = true;
  const methods: ConsoleLevel[] = ["log", "info", "warn", "error", "debug"];
  for (const method of methods) {
    const original = console[method].bind(console);
    console[method] = createStructuredConsoleWrapper(original, LEVELS[method]);
  }
}
