import { spawn } from 'node:child_process';
import { once, type EventEmitter } from 'node:events';
import path from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { EngineError, EngineFatalError } from '../bridge/errors.js';
import type { Query } from '../bridge/introspection.js';
import { Logger } from '../utils/logger.js';
import { expandPath } from '../utils/path.js';
import { Waiter } from '../utils/waiter.js';
import type { InterpreterBundle, InterpreterCore, StatusSnapshot, StepResult } from './types.js';

const INTERPRETER_ENV_ALLOWLIST = ['HOME', 'PATH', 'USER', 'LOGNAME', 'SHELL', 'LANG', 'LC_ALL', 'TZ', 'TERM'] as const;

const STDERR_TAIL_CHARS = 2000;

export interface InterpreterProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type InterpreterSpawner = (
  command: string,
  args: string[],
  options: { cwd: string; env: NodeJS.ProcessEnv },
) => InterpreterProcess;

const defaultSpawner: InterpreterSpawner = (command, args, options) =>
  spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ['pipe', 'pipe', 'pipe'],
    windowsHide: true,
  });

const buildInterpreterEnv = (cwd: string): NodeJS.ProcessEnv => {
  const base: NodeJS.ProcessEnv = { PWD: cwd };
  for (const key of INTERPRETER_ENV_ALLOWLIST) {
    const value = process.env[key];
    if (typeof value === 'string' && value.length > 0) {
      base[key] = value;
    }
  }
  return base;
};

export const splitCommand = (command: string, args: string) => {
  const parsed = args && args.trim().length > 0
    ? args
        .trim()
        .match(/(?:"[^"]*"|[^\s"]+)/g)
        ?.map((value) => value.replace(/^"(.*)"$/, '$1')) ?? []
    : [];
  return [command, ...parsed];
};

export interface ProcessState {
  child: InterpreterProcess;
  storyFile: string;
  chunks: string[];
  stderrTail: string;
  sawOutput: boolean;
  exited: boolean;
  exitCode: number | null;
  exitSignal: string | null;
  failure: Error | null;
  linesFed: number;
  listeners: Set<() => void>;
}

export interface ProcessInterpreterOptions {
  command: string;
  args?: string;
  storyFile: string;
  cwd?: string;
  // stdout quiet this long means the story wants a line.
  idleMs?: number;
  startupMs?: number;
  spawner?: InterpreterSpawner;
  logger?: Logger;
}

const notifyActivity = (state: ProcessState) => {
  for (const listener of [...state.listeners]) {
    listener();
  }
};

const waitForActivity = (state: ProcessState, timeoutMs: number) =>
  new Promise<void>((resolve) => {
    const done = () => {
      clearTimeout(timer);
      state.listeners.delete(done);
      resolve();
    };
    const timer = setTimeout(done, timeoutMs);
    state.listeners.add(done);
  });

export class ProcessInterpreter implements InterpreterCore<ProcessState> {
  readonly name: string;
  private readonly logger: Logger;
  private readonly cwd: string;
  private readonly idleMs: number;
  private readonly startupMs: number;
  private readonly spawner: InterpreterSpawner;

  constructor(private readonly options: ProcessInterpreterOptions) {
    this.name = `process:${path.basename(options.command)}`;
    this.logger = options.logger ?? new Logger('engine.process');
    this.cwd = expandPath(options.cwd || process.cwd());
    this.idleMs = options.idleMs ?? 150;
    this.startupMs = options.startupMs ?? Math.max(2000, this.idleMs);
    this.spawner = options.spawner ?? defaultSpawner;
  }

  createState(): ProcessState {
    const [cmd, ...cmdArgs] = splitCommand(this.options.command, this.options.args ?? '');
    const storyFile = expandPath(this.options.storyFile);
    const child = this.spawner(cmd, [...cmdArgs, storyFile], { cwd: this.cwd, env: buildInterpreterEnv(this.cwd) });

    const state: ProcessState = {
      child,
      storyFile,
      chunks: [],
      stderrTail: '',
      sawOutput: false,
      exited: false,
      exitCode: null,
      exitSignal: null,
      failure: null,
      linesFed: 0,
      listeners: new Set(),
    };

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      state.chunks.push(chunk);
      state.sawOutput = true;
      notifyActivity(state);
    });
    child.stderr.on('data', (chunk: string) => {
      state.stderrTail = `${state.stderrTail}${chunk}`.slice(-STDERR_TAIL_CHARS);
    });
    child.on('error', (error: Error) => {
      this.logger.error('interpreter process error', { command: cmd, error: error.message });
      state.failure = error;
      state.exited = true;
      notifyActivity(state);
    });
    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      state.exited = true;
      state.exitCode = code;
      state.exitSignal = signal;
      notifyActivity(state);
    });

    this.logger.info('interpreter process spawned', { command: cmd, args: cmdArgs, storyFile, pid: child.pid });
    return state;
  }

  async step(state: ProcessState): Promise<StepResult> {
    if (state.chunks.length === 0 && !state.exited) {
      await waitForActivity(state, state.sawOutput ? this.idleMs : this.startupMs);
    }

    if (state.chunks.length > 0) {
      return { kind: 'continue', output: state.chunks.splice(0).join('') };
    }

    if (state.failure) {
      throw new EngineFatalError(`interpreter failed to run: ${state.failure.message}`, { cause: state.failure });
    }

    if (state.exited) {
      if (state.exitCode && state.exitCode !== 0) {
        const stderr = state.stderrTail.trim();
        throw new EngineFatalError(`interpreter exited with code ${state.exitCode}${stderr ? `: ${stderr}` : ''}`);
      }
      return { kind: 'halt' };
    }

    return { kind: 'input' };
  }

  async feedLine(state: ProcessState, line: string) {
    if (state.exited) {
      throw new EngineError('interpreter is no longer running', { recoverable: true });
    }
    const payload = line.endsWith('\n') ? line : `${line}\n`;
    state.linesFed += 1;
    if (!state.child.stdin.write(payload)) {
      await once(state.child.stdin, 'drain');
    }
  }

  whenOutput(state: ProcessState, signal: AbortSignal): Promise<void> {
    if (signal.aborted) return Promise.reject(signal.reason);
    if (state.chunks.length > 0 || state.exited) return Promise.resolve();
    const done = () => {
      state.listeners.delete(done);
      waiter.resolve();
    };
    const waiter = new Waiter<void>(signal, () => state.listeners.delete(done));
    state.listeners.add(done);
    return waiter.promise;
  }

  dispose(state: ProcessState) {
    if (state.exited) return;
    state.child.stdin.end();
    state.child.kill('SIGTERM');
  }
}

export const processQueries = {
  status: ((state) => ({
    engine: 'process',
    location: path.basename(state.storyFile),
    turns: state.linesFed,
    inventory: [],
    details: {
      pid: state.child.pid ?? null,
      exited: state.exited,
      exitCode: state.exitCode,
      buffered: state.chunks.length,
    },
  })) satisfies Query<ProcessState, StatusSnapshot>,
};

export const createProcessBundle = (options: ProcessInterpreterOptions): InterpreterBundle<ProcessState> => ({
  core: new ProcessInterpreter(options),
  status: processQueries.status,
});
