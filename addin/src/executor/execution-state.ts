import type { BridgeError } from "@cadbridge/core";

/**
 * Completion record shared between the waiting caller and the host's event
 * handlers for one transaction. Created fresh per call and thrown away after.
 *
 * `finished` goes false → true exactly once. `result` is written at most once
 * and never after `finished`.
 */
export class ExecutionState<R = string> {
  private _result: R | undefined;
  private _hostError: BridgeError | undefined;
  private _finished = false;
  private written = false;

  get result(): R | undefined {
    return this._result;
  }

  get hostError(): BridgeError | undefined {
    return this._hostError;
  }

  get finished(): boolean {
    return this._finished;
  }

  /** Execute phase. Returns false if the write was refused. */
  complete(result: R): boolean {
    if (this._finished || this.written) return false;
    this._result = result;
    this.written = true;
    return true;
  }

  /** Setup failure: records the error and finishes in one step. */
  fail(error: BridgeError): boolean {
    if (this._finished) return false;
    this._hostError = error;
    this._finished = true;
    return true;
  }

  /** Destroy phase. */
  finish(): boolean {
    if (this._finished) return false;
    this._finished = true;
    return true;
  }
}
