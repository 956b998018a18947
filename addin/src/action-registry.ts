/**
 * Registry of actions. Maps an action name (the request path) to a validated
 * handler. Built once when the bridge is constructed and never mutated.
 */

import type { ZodError, ZodTypeAny, z } from "zod";
import { type ActionParams, type BridgeResult, fail, invalidUserInput } from "@cadbridge/core";

export interface RegisteredAction {
  readonly name: string;
  readonly description: string;
  /** Validate params against the action's schema, then run the handler. */
  invoke(params: ActionParams): Promise<BridgeResult<unknown>>;
}

export interface ActionSpec<S extends ZodTypeAny> {
  name: string;
  description: string;
  input: S;
  handler: (params: z.output<S>) => Promise<BridgeResult<unknown>>;
}

/**
 * Bind an input schema to a handler. Params failing the schema never reach
 * the handler and come back as InvalidUserInput.
 */
export function defineAction<S extends ZodTypeAny>(spec: ActionSpec<S>): RegisteredAction {
  return {
    name: spec.name,
    description: spec.description,
    async invoke(params: ActionParams): Promise<BridgeResult<unknown>> {
      const parsed = spec.input.safeParse(params);
      if (!parsed.success) {
        return fail(invalidUserInput(formatIssues(spec.name, parsed.error)));
      }
      return spec.handler(parsed.data);
    },
  };
}

/** `Invalid parameters for action 'x': code: Required; filepath: Expected string, received number` */
export function formatIssues(actionName: string, error: ZodError): string {
  const issues = error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
  return `Invalid parameters for action '${actionName}': ${issues.join("; ")}`;
}

export class ActionRegistry {
  private readonly actions: ReadonlyMap<string, RegisteredAction>;

  constructor(actions: readonly RegisteredAction[]) {
    const map = new Map<string, RegisteredAction>();
    for (const action of actions) {
      if (map.has(action.name)) {
        throw new Error(`Duplicate action '${action.name}'`);
      }
      map.set(action.name, action);
    }
    this.actions = map;
  }

  get(name: string): RegisteredAction | undefined {
    return this.actions.get(name);
  }

  has(name: string): boolean {
    return this.actions.has(name);
  }

  names(): string[] {
    return [...this.actions.keys()];
  }

  get size(): number {
    return this.actions.size;
  }
}
