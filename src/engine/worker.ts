import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { EngineError, EngineFatalError, LifecycleError, WorkerStoppedError, errorMessage } from '../bridge/errors.js';
import type { PriorityCommandQueue } from '../bridge/command-queue.js';
import type { OutputChannel } from '../bridge/output-channel.js';
import type { IntrospectionBridge } from '../bridge/introspection.js';
import { directiveOf, errorChunk, fatalChunk, textChunk, type Command, type OutputChunk } from '../shared/protocol.js';
import { Logger } from '../utils/logger.js';
import { Waiter } from '../utils/waiter.js';
import type { InterpreterCore } from './types.js';

export type WorkerState = 'starting' | 'running' | 'stopping' | 'stopped';

export type WorkerPhase = 'idle' | 'stepping' | 'awaiting-input' | 'servicing';

export type WorkerExitReason = 'quit' | 'halt' | 'fatal' | 'forced';

export interface WorkerExit {
  reason: WorkerExitReason;
  error?: string;
  discarded: number;
  linesFed: number;
}

export interface EngineWorkerOptions<TState> {
  core: InterpreterCore<TState>;
  commands: PriorityCommandQueue;
  output: OutputChannel;
  introspection: IntrospectionBridge<TState>;
  logger?: Logger;
  onStateChange?: (state: WorkerState) => void;
}

type Attempt<T> = { ok: true; value: T } | { ok: false };

// Sole owner of engine state. Introspection is drained between steps, never during one.
export class EngineWorker<TState> {
  private readonly logger: Logger;
  private readonly abort = new AbortController();
  private readonly exit = new Waiter<WorkerExit>();
  private readonly idleWaiters: Waiter<void>[] = [];
  private current: WorkerState = 'starting';
  private activePhase: WorkerPhase = 'idle';
  private stopRequest: WorkerExitReason | null = null;
  private started = false;
  private linesFed = 0;

  constructor(private readonly options: EngineWorkerOptions<TState>) {
    this.logger = options.logger ?? new Logger('engine.worker');
  }

  get state() {
    return this.current;
  }

  get phase() {
    return this.activePhase;
  }

  async start(): Promise<void> {
    if (this.started) {
      throw new LifecycleError('lifecycle_already_started', 'engine worker already started');
    }
    this.started = true;

    let engineState: TState;
    try {
      engineState = await this.options.core.createState();
    } catch (error) {
      const message = `failed to start ${this.options.core.name}: ${errorMessage(error)}`;
      this.logger.error(message);
      await this.finish(undefined, { reason: 'fatal', error: message });
      throw new EngineFatalError(message, { cause: error });
    }

    if (this.stopRequest) {
      await this.finish(engineState, { reason: this.stopRequest });
      return;
    }

    this.transition('running');
    void this.run(engineState);
  }

  stop(reason: WorkerExitReason = 'forced') {
    if (this.current === 'stopped') return;
    this.requestStop(reason);
    if (!this.abort.signal.aborted) {
      this.abort.abort(new WorkerStoppedError('engine worker stop requested'));
    }
  }

  whenStopped(): Promise<WorkerExit> {
    return this.exit.promise;
  }

  // Awaiting input with an empty queue, or stopped.
  whenIdle(): Promise<void> {
    if (this.current === 'stopped') return Promise.resolve();
    if (this.activePhase === 'awaiting-input' && this.options.commands.size() === 0) return Promise.resolve();
    const waiter = new Waiter<void>();
    this.idleWaiters.push(waiter);
    return waiter.promise;
  }

  private async run(state: TState) {
    let awaitingInput = false;
    let outcome: { reason: WorkerExitReason; error?: string } | null = null;

    try {
      while (!this.stopRequest) {
        this.service(state);

        if (awaitingInput) {
          const command = this.options.commands.tryDequeue();
          if (!command) {
            if ((await this.waitForWork(state)) === 'output') awaitingInput = false;
            continue;
          }
          awaitingInput = await this.handleCommand(state, command);
        } else if (!this.handleOutOfBand()) {
          awaitingInput = await this.advance(state);
        }

        await yieldToEventLoop();
      }
    } catch (error) {
      if (this.abort.signal.aborted) {
        this.logger.warn('engine worker interrupted', { reason: this.stopRequest, error: errorMessage(error) });
      } else {
        const message = errorMessage(error);
        this.logger.error('engine fatal error', { engine: this.options.core.name, error: message });
        outcome = { reason: 'fatal', error: message };
      }
    }

    await this.finish(state, outcome ?? { reason: this.stopRequest ?? 'forced' });
  }

  private service(state: TState) {
    if (this.options.introspection.pending() === 0) return;
    const previous = this.activePhase;
    this.activePhase = 'servicing';
    const count = this.options.introspection.drain(state);
    this.activePhase = previous;
    this.logger.debug(`serviced ${count} introspection task(s)`);
  }

  private async waitForWork(state: TState): Promise<'work' | 'output'> {
    this.activePhase = 'awaiting-input';
    for (const waiter of this.idleWaiters.splice(0)) {
      waiter.resolve();
    }

    const local = new AbortController();
    const relay = () => local.abort(this.abort.signal.reason);
    this.abort.signal.addEventListener('abort', relay, { once: true });

    const work = (): 'work' => 'work';
    const waits: Promise<'work' | 'output'>[] = [
      this.options.commands.whenAvailable({ signal: local.signal }).then(work),
      this.options.introspection.whenPending({ signal: local.signal }).then(work),
    ];
    if (this.options.core.whenOutput) {
      waits.push(this.options.core.whenOutput(state, local.signal).then((): 'output' => 'output'));
    }

    try {
      return await Promise.race(waits);
    } catch (error) {
      if (this.stopRequest) return 'work';
      throw error;
    } finally {
      this.abort.signal.removeEventListener('abort', relay);
      local.abort();
    }
  }

  private async handleCommand(state: TState, command: Command): Promise<boolean> {
    const directive = directiveOf(command);
    if (directive === 'quit') {
      this.logger.info('quit directive received', { sequence: command.sequence });
      this.requestStop('quit');
      return true;
    }
    if (directive === 'cancel') {
      this.cancelPendingInput();
      return true;
    }

    this.activePhase = 'stepping';
    const fed = await this.attempt(() => this.options.core.feedLine(state, command.text));
    this.activePhase = 'idle';
    if (!fed.ok) return true;

    this.linesFed += 1;
    this.logger.debug('line delivered', { source: command.source, sequence: command.sequence });
    return false;
  }

  // quit and cancel apply even while the interpreter is busy.
  private handleOutOfBand(): boolean {
    const head = this.options.commands.peek();
    const directive = head ? directiveOf(head) : null;
    if (directive !== 'quit' && directive !== 'cancel') return false;

    this.options.commands.tryDequeue();
    if (directive === 'quit') {
      this.logger.info('quit directive received while engine busy');
      this.requestStop('quit');
    } else {
      this.cancelPendingInput();
    }
    return true;
  }

  private async advance(state: TState): Promise<boolean> {
    this.activePhase = 'stepping';
    const stepped = await this.attempt(() => this.options.core.step(state));
    this.activePhase = 'idle';
    if (!stepped.ok) return false;

    const result = stepped.value;
    if (result.output) {
      await this.emit(textChunk(result.output));
    }
    if (result.kind === 'halt') {
      this.logger.info(`${this.options.core.name} halted`);
      this.requestStop('halt');
    }
    return result.kind === 'input';
  }

  private cancelPendingInput() {
    const dropped = this.options.commands.purge((command) => command.source !== 'system');
    this.logger.info(`cancel directive dropped ${dropped.length} pending command(s)`);
  }

  private async attempt<T>(action: () => T | Promise<T>): Promise<Attempt<T>> {
    try {
      return { ok: true, value: await action() };
    } catch (error) {
      if (error instanceof EngineError && error.recoverable) {
        this.logger.warn('recoverable engine error', { error: error.message });
        await this.emit(errorChunk(error.message));
        return { ok: false };
      }
      throw error;
    }
  }

  private emit(chunk: OutputChunk) {
    return this.options.output.write(chunk, { signal: this.abort.signal });
  }

  private requestStop(reason: WorkerExitReason) {
    if (!this.stopRequest || reason === 'forced') {
      this.stopRequest = reason;
    }
  }

  private async finish(state: TState | undefined, outcome: { reason: WorkerExitReason; error?: string }) {
    this.transition('stopping');
    this.activePhase = 'idle';

    const discarded = this.options.commands.close('engine worker stopped');
    this.options.introspection.shutdown(new WorkerStoppedError());

    if (outcome.reason === 'fatal' && outcome.error) {
      await this.emit(fatalChunk(outcome.error)).catch((error: unknown) => {
        this.logger.warn('fatal chunk not delivered', { error: errorMessage(error) });
      });
    }

    if (state !== undefined && this.options.core.dispose) {
      try {
        await this.options.core.dispose(state);
      } catch (error) {
        this.logger.warn('interpreter dispose failed', { error: errorMessage(error) });
      }
    }

    this.options.output.close();
    this.transition('stopped');
    for (const waiter of this.idleWaiters.splice(0)) {
      waiter.resolve();
    }
    this.logger.info('engine worker stopped', { reason: outcome.reason, discarded: discarded.length });
    this.exit.resolve({
      reason: outcome.reason,
      error: outcome.error,
      discarded: discarded.length,
      linesFed: this.linesFed,
    });
  }

  private transition(next: WorkerState) {
    if (this.current === next) return;
    this.current = next;
    this.options.onStateChange?.(next);
  }
}
