/**
 * In-process host with a cooperative event queue.
 *
 * Nothing scheduled on the host runs until somebody calls `doEvents()`, the
 * same constraint a real CAD host's UI thread imposes. Used by the dev entry
 * point and by tests.
 */

import { writeFileSync } from "node:fs";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { errorMessage, resolveLogger, type Logger, type LoggerFactory } from "@cadbridge/core";
import type {
  CommandCreatedEventArgs,
  CommandEventArgs,
  HostApplication,
  HostCommand,
  HostCommandDefinition,
  HostCommandDefinitions,
  HostComponent,
  HostDesign,
  HostEvent,
  HostParameter,
  HostParameterList,
  HostViewport,
} from "./types.js";

const SERVICE_NAME = "cadbridge-addin:simulated-host";

// 1x1 transparent PNG
const PLACEHOLDER_PNG = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=",
  "base64",
);

// ── Events & commands ───────────────────────────────────────────────

export class SimulatedEvent<TArgs> implements HostEvent<TArgs> {
  private handlers: Array<(args: TArgs) => void> = [];

  constructor(
    private readonly eventName: string,
    private readonly log: Logger,
  ) {}

  add(handler: (args: TArgs) => void): void {
    this.handlers.push(handler);
  }

  remove(handler: (args: TArgs) => void): boolean {
    const index = this.handlers.indexOf(handler);
    if (index < 0) return false;
    this.handlers.splice(index, 1);
    return true;
  }

  get handlerCount(): number {
    return this.handlers.length;
  }

  /** Invoke every handler. A throwing handler is logged and does not stop the rest. */
  fire(args: TArgs): void {
    for (const handler of [...this.handlers]) {
      try {
        handler(args);
      } catch (err) {
        this.log.error?.(
          { event: this.eventName, error: errorMessage(err) },
          `${SERVICE_NAME}:fire - Event handler threw`,
        );
      }
    }
  }
}

class SimulatedCommand implements HostCommand {
  isAutoExecute = false;
  readonly execute: SimulatedEvent<CommandEventArgs>;
  readonly destroy: SimulatedEvent<CommandEventArgs>;

  constructor(log: Logger) {
    this.execute = new SimulatedEvent("execute", log);
    this.destroy = new SimulatedEvent("destroy", log);
  }
}

class SimulatedCommandDefinition implements HostCommandDefinition {
  readonly commandCreated: SimulatedEvent<CommandCreatedEventArgs>;

  constructor(
    readonly id: string,
    readonly name: string,
    readonly tooltip: string,
    private readonly owner: SimulatedCommandDefinitions,
    log: Logger,
  ) {
    this.commandCreated = new SimulatedEvent("commandCreated", log);
  }

  execute(): boolean {
    return this.owner.schedule(this);
  }

  deleteMe(): boolean {
    return this.owner.remove(this.id);
  }
}

class SimulatedCommandDefinitions implements HostCommandDefinitions {
  private definitions = new Map<string, SimulatedCommandDefinition>();

  constructor(
    private readonly enqueue: (task: () => void) => void,
    private readonly log: Logger,
  ) {}

  addButtonDefinition(id: string, name: string, tooltip: string): HostCommandDefinition {
    if (this.definitions.has(id)) {
      throw new Error(`Command definition '${id}' already exists`);
    }
    const definition = new SimulatedCommandDefinition(id, name, tooltip, this, this.log);
    this.definitions.set(id, definition);
    return definition;
  }

  itemById(id: string): HostCommandDefinition | null {
    return this.definitions.get(id) ?? null;
  }

  get count(): number {
    return this.definitions.size;
  }

  remove(id: string): boolean {
    return this.definitions.delete(id);
  }

  /**
   * Queue the created → execute → destroy chain. Each phase is a separate
   * queued event, so a caller must keep pumping to see it through.
   */
  schedule(definition: SimulatedCommandDefinition): boolean {
    if (!this.definitions.has(definition.id)) return false;

    this.enqueue(() => {
      const command = new SimulatedCommand(this.log);
      definition.commandCreated.fire({ command });
      if (command.isAutoExecute) {
        this.enqueue(() => command.execute.fire({ command }));
      }
      this.enqueue(() => command.destroy.fire({ command }));
    });
    return true;
  }
}

// ── Design & viewport ───────────────────────────────────────────────

const EXPRESSION_PATTERN = /^\s*(-?\d+(?:\.\d+)?)\s*([A-Za-z]*)\s*$/;

export class SimulatedParameter implements HostParameter {
  private currentExpression: string;
  private currentValue: number;
  private currentUnit: string;

  constructor(
    readonly name: string,
    expression: string,
    unit: string,
    readonly comment: string | null = null,
  ) {
    this.currentUnit = unit;
    this.currentExpression = expression;
    this.currentValue = this.evaluate(expression);
  }

  get value(): number {
    return this.currentValue;
  }

  get unit(): string {
    return this.currentUnit;
  }

  get expression(): string {
    return this.currentExpression;
  }

  set expression(expression: string) {
    this.currentValue = this.evaluate(expression);
    this.currentExpression = expression;
  }

  private evaluate(expression: string): number {
    const match = EXPRESSION_PATTERN.exec(expression);
    if (!match) {
      throw new Error(`Invalid expression '${expression}'`);
    }
    if (match[2]) this.currentUnit = match[2];
    return Number(match[1]);
  }
}

class SimulatedParameterList implements HostParameterList {
  constructor(private readonly items: () => HostParameter[]) {}

  itemByName(name: string): HostParameter | null {
    return this.items().find((p) => p.name === name) ?? null;
  }

  asArray(): HostParameter[] {
    return [...this.items()];
  }
}

export class SimulatedDesign implements HostDesign {
  readonly rootComponent: HostComponent;
  readonly userParameters: HostParameterList;
  readonly allParameters: HostParameterList;

  constructor(params: {
    rootName?: string;
    userParameters?: HostParameter[];
    modelParameters?: HostParameter[];
  } = {}) {
    const user = params.userParameters ?? [];
    const model = params.modelParameters ?? [];
    this.rootComponent = { name: params.rootName ?? "(Unsaved)" };
    this.userParameters = new SimulatedParameterList(() => user);
    this.allParameters = new SimulatedParameterList(() => [...user, ...model]);
  }
}

/** Writes a placeholder image wherever a screenshot is requested. */
export class SimulatedViewport implements HostViewport {
  readonly saved: string[] = [];

  constructor(private readonly log: Logger) {}

  saveAsImageFile(filepath: string, _width: number, _height: number): boolean {
    try {
      writeFileSync(filepath, PLACEHOLDER_PNG);
      this.saved.push(filepath);
      return true;
    } catch (err) {
      this.log.warn?.({ filepath, error: errorMessage(err) }, `${SERVICE_NAME}:saveAsImageFile - Write failed`);
      return false;
    }
  }
}

// ── Host ────────────────────────────────────────────────────────────

export interface SimulatedHostOptions {
  /** Active design; `null` simulates "no document open" */
  design?: HostDesign | null;
  /** Active viewport; `null` simulates "no viewport" */
  viewport?: HostViewport | null;
  loggerFactory?: LoggerFactory;
}

export class SimulatedHost implements HostApplication {
  readonly commandDefinitions: HostCommandDefinitions;
  readonly activeDesign: HostDesign | null;
  readonly activeViewport: HostViewport | null;
  private queue: Array<() => void> = [];
  private pumps = 0;

  constructor(options: SimulatedHostOptions = {}) {
    const log = resolveLogger(options.loggerFactory, SERVICE_NAME);
    this.commandDefinitions = new SimulatedCommandDefinitions((task) => this.queue.push(task), log);
    this.activeDesign = options.design === undefined ? new SimulatedDesign() : options.design;
    this.activeViewport = options.viewport === undefined ? new SimulatedViewport(log) : options.viewport;
  }

  /**
   * Yield one macrotask, then dispatch the events queued before this call.
   * Events queued while dispatching wait for the next pump.
   */
  async doEvents(): Promise<void> {
    await yieldToEventLoop();
    this.pumps++;
    const batch = this.queue.splice(0);
    for (const task of batch) {
      task();
    }
  }

  /** Events waiting for the next pump. */
  get pendingEvents(): number {
    return this.queue.length;
  }

  /** How many times `doEvents()` dispatched. */
  get pumpCount(): number {
    return this.pumps;
  }
}
