import type { Query } from '../bridge/introspection.js';

export type StepResult =
  | { kind: 'continue'; output?: string }
  | { kind: 'input'; output?: string }
  | { kind: 'halt'; output?: string };

export interface InterpreterCore<TState> {
  readonly name: string;
  createState(): TState | Promise<TState>;
  step(state: TState): StepResult | Promise<StepResult>;
  feedLine(state: TState, line: string): void | Promise<void>;
  /**
   * Settles when the interpreter has output it was not asked for while waiting
   * for a line (an external process printing late, or exiting). The worker then
   * steps again before it takes the next command.
   */
  whenOutput?(state: TState, signal: AbortSignal): Promise<void>;
  dispose?(state: TState): void | Promise<void>;
}

export interface StatusSnapshot {
  engine: string;
  location: string;
  turns: number;
  score?: number;
  inventory: string[];
  details: Record<string, string | number | boolean | null>;
}

export interface InterpreterBundle<TState> {
  core: InterpreterCore<TState>;
  status: Query<TState, StatusSnapshot>;
}
