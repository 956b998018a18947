/**
 * Transactional executor: runs work as a single undoable host transaction and
 * hands its result back to an async caller.
 *
 * The host only runs command handlers on its own event pump, so work is never
 * run directly. Instead a temporary command definition is registered and
 * executed, and the caller pumps host events until the
 * created → execute → destroy chain has completed:
 *
 *   created  attach execute/destroy handlers, mark auto-execute
 *   execute  start the work, record its result once it settles
 *   destroy  delete the temporary definition, mark finished after the work
 *            has settled
 *
 * For code payloads a failing script is not a bridge error: its trace is part
 * of the returned output. Only failures to reach the host or set the
 * transaction up are reported as errors.
 */

import { randomUUID } from "node:crypto";
import {
  type BridgeResult,
  type Logger,
  type LoggerFactory,
  errorMessage,
  executionError,
  fail,
  invalidUserInput,
  isBridgeError,
  ok,
  resolveLogger,
} from "@cadbridge/core";
import type {
  CommandCreatedEventArgs,
  HostApplication,
  HostCommandDefinition,
  HostComponent,
  HostDesign,
} from "../host/types.js";
import { driveUntil } from "./drive.js";
import { ExecutionState } from "./execution-state.js";
import { OutputCapture, VmWorkRunner, formatTrace, isThenable, type WorkRunner } from "./work-runner.js";

const SERVICE_NAME = "cadbridge-addin:executor";
const EXECUTE_CODE_ACTION = "execute_code";

export const TRACEBACK_SEPARATOR = "--- TRACEBACK ---";
export const DEFAULT_TRANSACTION_LABEL = "Script Execution";

export interface TransactionalExecutorParams {
  host: HostApplication;
  /** Defaults to VmWorkRunner */
  runner?: WorkRunner;
  loggerFactory?: LoggerFactory;
  /** Transaction id generator; ids must be unique among registered definitions */
  createId?: () => string;
}

/** Bindings the work sees: application, active design, its root component. */
export interface HostNamespace {
  app: HostApplication;
  design: HostDesign | null;
  rootComp: HostComponent | null;
}

export class TransactionalExecutor {
  private readonly host: HostApplication;
  private readonly runner: WorkRunner;
  private readonly log: Logger;
  private readonly createId: () => string;

  constructor(params: TransactionalExecutorParams) {
    this.host = params.host;
    this.runner = params.runner ?? new VmWorkRunner();
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
    this.createId = params.createId ?? (() => `CadBridgeTransaction_${randomUUID()}`);
  }

  /**
   * Run a code payload inside a host transaction named `label`.
   * Resolves with the captured output; a payload that throws resolves with
   * its output followed by the trace. A payload whose completion value is a
   * promise is awaited, and a rejection is reported the same way as a throw.
   */
  async executeInTransaction(
    work: string,
    label: string = DEFAULT_TRANSACTION_LABEL,
  ): Promise<BridgeResult<string>> {
    if (!work || !work.trim()) {
      return fail(invalidUserInput(`Parameter 'code' cannot be empty for action '${EXECUTE_CODE_ACTION}'`));
    }

    const outcome = await this.transact<string>({
      actionName: EXECUTE_CODE_ACTION,
      label,
      work: (namespace) => this.runCaptured(work, label, namespace),
    });
    if (!outcome.ok) return outcome;
    if (outcome.data === undefined) {
      this.log.warn?.(
        { label },
        `${SERVICE_NAME}:executeInTransaction - Transaction finished without executing the script`,
      );
      return ok("");
    }
    return ok(outcome.data);
  }

  /**
   * Run a host-side function inside a transaction. Use this for any action
   * that touches host objects, so the access happens on the host's pump.
   * A throw inside `fn` becomes an ExecutionError for `actionName`.
   */
  async runOnHost<T>(params: {
    actionName: string;
    label: string;
    fn: (host: HostApplication) => BridgeResult<T>;
  }): Promise<BridgeResult<T>> {
    const { actionName, label, fn } = params;
    const outcome = await this.transact<BridgeResult<T>>({
      actionName,
      label,
      work: () => {
        try {
          return Promise.resolve(fn(this.host));
        } catch (err) {
          return Promise.resolve(fail(isBridgeError(err) ? err : executionError(actionName, errorMessage(err), err)));
        }
      },
    });
    if (!outcome.ok) return outcome;
    if (outcome.data === undefined) {
      return fail(executionError(actionName, `Transaction '${label}' finished without executing`));
    }
    return outcome.data;
  }

  /**
   * Run the payload with print/console redirected into a capture buffer.
   * The synchronous part runs before this returns; the buffer is read and
   * released once the completion value has settled. Never rejects.
   */
  private runCaptured(work: string, label: string, namespace: HostNamespace): Promise<string> {
    const capture = new OutputCapture();
    const traced = (err: unknown): string => `${capture.read()}\n${TRACEBACK_SEPARATOR}\n${formatTrace(err)}`;

    let completion: unknown;
    try {
      completion = this.runner.run(work, {
        namespace: { ...namespace, print: capture.print, console: capture.console() },
        label,
      });
    } catch (err) {
      const output = traced(err);
      capture.release();
      return Promise.resolve(output);
    }

    if (!isThenable(completion)) {
      const output = capture.read();
      capture.release();
      return Promise.resolve(output);
    }
    return Promise.resolve(completion)
      .then(() => capture.read(), traced)
      .finally(() => capture.release());
  }

  /**
   * The create → execute → destroy state machine. `work` is started inside
   * the execute handler and must neither throw nor reject. Resolves once the
   * destroy handler (or a setup failure) has marked the state finished; the
   * destroy handler waits for the work to settle first.
   */
  private async transact<R>(params: {
    actionName: string;
    label: string;
    work: (namespace: HostNamespace) => Promise<R>;
  }): Promise<BridgeResult<R | undefined>> {
    const { actionName, label, work } = params;

    let namespace: HostNamespace;
    try {
      namespace = this.buildNamespace();
    } catch (err) {
      this.log.error?.({ actionName, error: errorMessage(err) }, `${SERVICE_NAME}:transact - Host unavailable`);
      return fail(executionError(actionName, `Failed to prepare execution environment: ${errorMessage(err)}`, err));
    }

    const transactionId = this.createId();
    let definition: HostCommandDefinition;
    try {
      definition = this.host.commandDefinitions.addButtonDefinition(transactionId, label, label);
    } catch (err) {
      this.log.error?.(
        { actionName, transactionId, error: errorMessage(err) },
        `${SERVICE_NAME}:transact - Failed to register command definition`,
      );
      return fail(executionError(actionName, `Failed to register transaction: ${errorMessage(err)}`, err));
    }

    const state = new ExecutionState<R>();
    const pending: { settling?: Promise<void>; finishing?: Promise<void> } = {};

    const onExecute = (): void => {
      if (state.finished || pending.settling) return;
      pending.settling = work(namespace).then(
        (result) => {
          state.complete(result);
        },
        (err: unknown) => {
          state.fail(executionError(actionName, errorMessage(err), err));
        },
      );
    };

    const onDestroy = (): void => {
      try {
        if (!definition.deleteMe()) {
          this.log.warn?.({ transactionId }, `${SERVICE_NAME}:onDestroy - Command definition already removed`);
        }
      } catch (err) {
        this.log.warn?.(
          { transactionId, error: errorMessage(err) },
          `${SERVICE_NAME}:onDestroy - Failed to delete command definition`,
        );
      } finally {
        pending.finishing = (pending.settling ?? Promise.resolve()).then(() => {
          state.finish();
        });
      }
    };

    const onCreated = ({ command }: CommandCreatedEventArgs): void => {
      if (state.finished) return;
      try {
        command.execute.add(onExecute);
        command.destroy.add(onDestroy);
        command.isAutoExecute = true;
      } catch (err) {
        this.log.error?.(
          { transactionId, error: errorMessage(err) },
          `${SERVICE_NAME}:onCreated - Command setup failed`,
        );
        state.fail(executionError(actionName, `Failed to set up transaction '${label}': ${errorMessage(err)}`, err));
      }
    };

    definition.commandCreated.add(onCreated);

    try {
      if (!definition.execute()) {
        state.fail(executionError(actionName, `Host refused to run transaction '${label}'`));
      }
    } catch (err) {
      state.fail(executionError(actionName, `Failed to start transaction '${label}': ${errorMessage(err)}`, err));
    }

    const pumps = await driveUntil({
      done: () => state.finished,
      pump: () => this.host.doEvents(),
    });
    if (pending.finishing) await pending.finishing;

    this.log.debug?.({ actionName, transactionId, pumps }, `${SERVICE_NAME}:transact - Transaction finished`);

    if (state.hostError) {
      this.removeDefinition(transactionId);
      return fail(state.hostError);
    }
    return ok(state.result);
  }

  private buildNamespace(): HostNamespace {
    const app = this.host;
    const design = app.activeDesign;
    return {
      app,
      design,
      rootComp: design ? design.rootComponent : null,
    };
  }

  /** Delete a definition the destroy handler never got to. */
  private removeDefinition(transactionId: string): void {
    try {
      this.host.commandDefinitions.itemById(transactionId)?.deleteMe();
    } catch (err) {
      this.log.warn?.(
        { transactionId, error: errorMessage(err) },
        `${SERVICE_NAME}:removeDefinition - Failed to delete command definition`,
      );
    }
  }
}
