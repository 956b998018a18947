/**
 * Pluggable execution of an opaque unit of work against a fixed namespace.
 *
 * The default runner evaluates the payload as JavaScript in a fresh `vm`
 * context whose globals are the namespace bindings. The context is not a
 * security boundary: the work has whatever capability the bindings give it.
 */

import { runInNewContext } from "node:vm";
import { format, types } from "node:util";

export interface WorkContext {
  /** Bindings visible to the work as globals */
  namespace: Record<string, unknown>;
  /** Transaction label, shown as the filename in stack traces */
  label: string;
}

export interface WorkRunner {
  /**
   * Runs synchronously on the host's event thread and returns the work's
   * completion value. Throws whatever the work throws. A thenable completion
   * value is awaited by the caller.
   */
  run(work: string, context: WorkContext): unknown;
}

export interface VmWorkRunnerOptions {
  /** Abort synchronous execution after this many ms (vm timeout). Unset = no limit. */
  timeoutMs?: number;
}

export class VmWorkRunner implements WorkRunner {
  constructor(private readonly options: VmWorkRunnerOptions = {}) {}

  run(work: string, context: WorkContext): unknown {
    return runInNewContext(work, { ...context.namespace }, {
      filename: context.label,
      timeout: this.options.timeoutMs,
    });
  }
}

type PrintFn = (...args: unknown[]) => void;

/**
 * Capture buffer for print-like output produced by the work.
 * `print` and the `console` binding both append `format(...args) + "\n"`.
 */
export class OutputCapture {
  private chunks: string[] = [];

  readonly print: PrintFn = (...args) => {
    this.chunks.push(`${format(...args)}\n`);
  };

  console(): Record<"log" | "info" | "warn" | "error" | "debug", PrintFn> {
    return {
      log: this.print,
      info: this.print,
      warn: this.print,
      error: this.print,
      debug: this.print,
    };
  }

  read(): string {
    return this.chunks.join("");
  }

  release(): void {
    this.chunks = [];
  }
}

/** Also true for promises created in another vm context. */
export function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

/** Stack trace text for anything the work threw. */
export function formatTrace(err: unknown): string {
  if (types.isNativeError(err)) {
    return err.stack ?? `${err.name}: ${err.message}`;
  }
  return `Uncaught ${format(err)}`;
}
