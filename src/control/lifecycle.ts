import type { AppConfig } from '../config.js';
import { PriorityCommandQueue } from '../bridge/command-queue.js';
import { OutputChannel } from '../bridge/output-channel.js';
import { IntrospectionBridge, type Query } from '../bridge/introspection.js';
import { LifecycleError, QueueClosedError, errorMessage } from '../bridge/errors.js';
import { EngineWorker, type WorkerExit, type WorkerState } from '../engine/worker.js';
import type { InterpreterCore } from '../engine/types.js';
import { SYSTEM_PRIORITY, type Command, type CommandSource, type SystemDirective, type WaitOptions } from '../shared/protocol.js';
import { Logger } from '../utils/logger.js';
import { raceSignal } from '../utils/waiter.js';
import { sanitizeInput, type InputRejection } from './input.js';

export type SubmitResult = { accepted: true; command: Command } | { accepted: false; reason: InputRejection };

export interface CommandSink {
  submit(text: string | Uint8Array, source: CommandSource, options?: WaitOptions): Promise<SubmitResult>;
  control(directive: SystemDirective, options?: WaitOptions): Promise<SubmitResult>;
  whenIdle(): Promise<void>;
}

export interface InputProducer {
  readonly name: string;
  start(sink: CommandSink): void | Promise<void>;
  stop(): void | Promise<void>;
}

export interface SourcePriorities {
  keyboard: number;
  voice: number;
}

export interface LifecycleOptions<TState> {
  core: InterpreterCore<TState>;
  commandCapacity: number;
  outputCapacity: number;
  shutdownTimeoutMs: number;
  forceStopGraceMs: number;
  priorities: SourcePriorities;
  maxInputBytes: number;
  producers?: InputProducer[];
  logger?: Logger;
  onWorkerState?: (state: WorkerState) => void;
}

export type LifecyclePhase = 'idle' | 'starting' | 'running' | 'shutting-down' | 'stopped';

export interface ShutdownResult {
  mode: 'graceful' | 'forced';
  timedOut: boolean;
  exit?: WorkerExit;
}

export const lifecycleSettings = (config: AppConfig) => ({
  commandCapacity: config.COMMAND_QUEUE_CAPACITY,
  outputCapacity: config.OUTPUT_CHANNEL_CAPACITY,
  shutdownTimeoutMs: config.SHUTDOWN_TIMEOUT_MS,
  forceStopGraceMs: config.FORCE_STOP_GRACE_MS,
  priorities: { keyboard: config.PRIORITY_KEYBOARD, voice: config.PRIORITY_VOICE },
  maxInputBytes: config.MAX_INPUT_BYTES,
});

export class LifecycleController<TState> implements CommandSink {
  readonly commands: PriorityCommandQueue;
  readonly output: OutputChannel;
  private readonly introspection = new IntrospectionBridge<TState>();
  private readonly worker: EngineWorker<TState>;
  private readonly logger: Logger;
  private readonly producers: InputProducer[];
  private readonly activeProducers: InputProducer[] = [];
  private current: LifecyclePhase = 'idle';
  private startPromise: Promise<void> | null = null;
  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(private readonly options: LifecycleOptions<TState>) {
    this.logger = options.logger ?? new Logger('lifecycle');
    this.producers = [...(options.producers ?? [])];
    this.commands = new PriorityCommandQueue(options.commandCapacity);
    this.output = new OutputChannel(options.outputCapacity);
    this.worker = new EngineWorker<TState>({
      core: options.core,
      commands: this.commands,
      output: this.output,
      introspection: this.introspection,
      logger: this.logger.child('worker'),
      onStateChange: options.onWorkerState,
    });
  }

  get phase() {
    return this.current;
  }

  get workerState() {
    return this.worker.state;
  }

  start(): Promise<void> {
    if (this.startPromise) {
      return Promise.reject(new LifecycleError('lifecycle_already_started', 'session already started'));
    }
    this.startPromise = this.performStart();
    return this.startPromise;
  }

  async submit(text: string | Uint8Array, source: CommandSource, options: WaitOptions = {}): Promise<SubmitResult> {
    if (this.current === 'idle' || this.current === 'starting') {
      throw new LifecycleError('lifecycle_not_running', 'session is not running yet');
    }

    const sanitized = sanitizeInput(text, this.options.maxInputBytes);
    if (!sanitized.ok) {
      this.logger.warn('discarding invalid input', { source, reason: sanitized.reason });
      return { accepted: false, reason: sanitized.reason };
    }

    const command = await this.commands.enqueue(sanitized.text, source, this.priorityFor(source), options);
    return { accepted: true, command };
  }

  control(directive: SystemDirective, options: WaitOptions = {}): Promise<SubmitResult> {
    return this.submit(directive, 'system', options);
  }

  query<TResult>(query: Query<TState, TResult>, options: WaitOptions = {}): Promise<TResult> {
    return this.introspection.call(query, options);
  }

  whenStopped(): Promise<WorkerExit> {
    return this.worker.whenStopped();
  }

  whenIdle(): Promise<void> {
    return this.worker.whenIdle();
  }

  shutdown(): Promise<ShutdownResult> {
    this.shutdownPromise ??= this.performShutdown();
    return this.shutdownPromise;
  }

  private priorityFor(source: CommandSource) {
    if (source === 'system') return SYSTEM_PRIORITY;
    return this.options.priorities[source];
  }

  private async performStart() {
    this.current = 'starting';
    try {
      await this.worker.start();
    } catch (error) {
      this.current = 'stopped';
      throw error;
    }

    this.current = 'running';
    void this.worker.whenStopped().then((exit) => this.onWorkerStopped(exit));

    for (const producer of this.producers) {
      await producer.start(this);
      this.activeProducers.push(producer);
      this.logger.info(`producer ${producer.name} started`);
    }
  }

  private async onWorkerStopped(exit: WorkerExit) {
    this.logger.info('engine worker exited', { reason: exit.reason, error: exit.error });
    if (this.current === 'running') this.current = 'stopped';
    await this.stopProducers();
  }

  private async stopProducers() {
    for (const producer of this.activeProducers.splice(0).reverse()) {
      try {
        await producer.stop();
      } catch (error) {
        this.logger.error(`producer ${producer.name} failed to stop`, { error: errorMessage(error) });
      }
    }
  }

  private async performShutdown(): Promise<ShutdownResult> {
    if (this.startPromise) {
      // A failed start already rejected to its own caller.
      await this.startPromise.catch(() => undefined);
    }

    if (this.current === 'idle') {
      this.current = 'stopped';
      this.commands.close('session shut down');
      this.output.close();
      return { mode: 'graceful', timedOut: false };
    }

    if (this.current === 'stopped') {
      await this.stopProducers();
      return { mode: 'graceful', timedOut: false, exit: await this.worker.whenStopped() };
    }

    this.current = 'shutting-down';
    await this.stopProducers();

    let exit: WorkerExit | undefined;
    let timedOut = false;
    const deadline = AbortSignal.timeout(this.options.shutdownTimeoutMs);

    try {
      await this.commands.enqueue('quit', 'system', SYSTEM_PRIORITY, { signal: deadline });
      exit = await raceSignal(this.worker.whenStopped(), deadline);
    } catch (error) {
      if (error instanceof QueueClosedError) {
        exit = await raceSignal(this.worker.whenStopped(), deadline).catch(() => undefined);
        timedOut = exit === undefined;
      } else if (deadline.aborted) {
        timedOut = true;
      } else {
        throw error;
      }
    }

    if (timedOut) {
      this.logger.warn(`graceful shutdown timed out after ${this.options.shutdownTimeoutMs}ms, forcing stop`);
      this.worker.stop('forced');
      exit = await raceSignal(this.worker.whenStopped(), AbortSignal.timeout(this.options.forceStopGraceMs)).catch(() => {
        this.logger.error('engine worker did not stop; abandoning it');
        return undefined;
      });
      this.commands.close('session shut down');
      this.output.close();
    }

    this.current = 'stopped';
    return { mode: timedOut ? 'forced' : 'graceful', timedOut, exit };
  }
}
