export type CommandSource = 'keyboard' | 'voice' | 'system';

export const COMMAND_SOURCES: readonly CommandSource[] = ['keyboard', 'voice', 'system'];

export const SYSTEM_PRIORITY = Number.MAX_SAFE_INTEGER;

export type SystemDirective = 'quit' | 'cancel' | 'undo';

export const SYSTEM_DIRECTIVES: readonly SystemDirective[] = ['quit', 'cancel', 'undo'];

export const isSystemDirective = (value: string): value is SystemDirective =>
  SYSTEM_DIRECTIVES.some((directive) => directive === value);

export interface Command {
  readonly text: string;
  readonly source: CommandSource;
  readonly priority: number;
  readonly sequence: number;
}

export const createCommand = (text: string, source: CommandSource, priority: number, sequence: number): Command =>
  Object.freeze({ text, source, priority, sequence });

// Sequences are unique per queue, so two commands never compare equal.
export const compareCommands = (a: Command, b: Command) => {
  if (a.priority !== b.priority) return b.priority > a.priority ? 1 : -1;
  return a.sequence - b.sequence;
};

export const directiveOf = (command: Command): SystemDirective | null => {
  if (command.source !== 'system') return null;
  const text = command.text.trim().toLowerCase();
  return isSystemDirective(text) ? text : null;
};

export type OutputTag = 'text' | 'error' | 'fatal';

export interface OutputChunk {
  readonly tag: OutputTag;
  readonly text: string;
}

export const END_OF_STREAM: unique symbol = Symbol('ifbridge.end-of-stream');

export type EndOfStream = typeof END_OF_STREAM;

export type OutputRead = OutputChunk | EndOfStream;

export const isEndOfStream = (value: OutputRead | undefined): value is EndOfStream => value === END_OF_STREAM;

export const textChunk = (text: string): OutputChunk => Object.freeze({ tag: 'text', text });

export const errorChunk = (text: string): OutputChunk => Object.freeze({ tag: 'error', text });

export const fatalChunk = (text: string): OutputChunk => Object.freeze({ tag: 'fatal', text });

export interface WaitOptions {
  signal?: AbortSignal;
}
