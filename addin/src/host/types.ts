/**
 * Host application model.
 *
 * The bridge never touches CAD objects except through these interfaces. All
 * event handlers run on the host's own cooperative event pump; the only way in
 * from outside is to register a command definition, execute it, and pump
 * events with `doEvents()` until its lifecycle completes.
 */

/** Host-side event with add/remove handler semantics. */
export interface HostEvent<TArgs> {
  add(handler: (args: TArgs) => void): void;
  remove(handler: (args: TArgs) => void): boolean;
}

/** A running command instance, created by the host for a definition. */
export interface HostCommand {
  /** When true the host runs `execute` immediately without showing UI. */
  isAutoExecute: boolean;
  readonly execute: HostEvent<CommandEventArgs>;
  readonly destroy: HostEvent<CommandEventArgs>;
}

export interface CommandEventArgs {
  readonly command: HostCommand;
}

export interface CommandCreatedEventArgs {
  readonly command: HostCommand;
}

/** A registered command definition. Executing it schedules a new command. */
export interface HostCommandDefinition {
  readonly id: string;
  readonly name: string;
  readonly commandCreated: HostEvent<CommandCreatedEventArgs>;
  /** Schedule the command. Returns false if the host refused. */
  execute(): boolean;
  /** Unregister the definition. Returns false if it was not registered. */
  deleteMe(): boolean;
}

export interface HostCommandDefinitions {
  addButtonDefinition(id: string, name: string, tooltip: string): HostCommandDefinition;
  itemById(id: string): HostCommandDefinition | null;
  readonly count: number;
}

export interface HostComponent {
  readonly name: string;
}

export interface HostParameter {
  readonly name: string;
  /** Evaluated value in the host's internal units */
  readonly value: number;
  readonly unit: string;
  /** Assigning re-evaluates the parameter; throws on an invalid expression */
  expression: string;
  readonly comment: string | null;
}

export interface HostParameterList {
  itemByName(name: string): HostParameter | null;
  asArray(): HostParameter[];
}

export interface HostDesign {
  readonly rootComponent: HostComponent;
  readonly userParameters: HostParameterList;
  readonly allParameters: HostParameterList;
}

export interface HostViewport {
  /** Width/height 0 means "current viewport size". */
  saveAsImageFile(filepath: string, width: number, height: number): boolean;
}

/**
 * Entry point to the host. Only ever touched from handlers the host itself
 * dispatches, or from code that is driving `doEvents()`.
 */
export interface HostApplication {
  readonly commandDefinitions: HostCommandDefinitions;
  readonly activeDesign: HostDesign | null;
  readonly activeViewport: HostViewport | null;
  /** Yield to the host and let it dispatch queued events. */
  doEvents(): Promise<void>;
}
