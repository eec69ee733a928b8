import type { Readable, Writable } from 'node:stream';
import type { AppConfig } from '../config.js';
import { errorMessage } from '../bridge/errors.js';
import { LifecycleController, lifecycleSettings, type InputProducer, type ShutdownResult } from '../control/lifecycle.js';
import { withInterpreter } from '../engine/index.js';
import type { InterpreterBundle } from '../engine/types.js';
import type { WorkerExit } from '../engine/worker.js';
import { ScriptProducer } from '../transports/script.js';
import { TerminalSession } from '../transports/terminal.js';
import { voiceProducerFor, type SpeechRecognizer } from '../transports/voice.js';
import { Transcript } from '../transports/transcript.js';
import { Logger } from '../utils/logger.js';
import { resolvePath } from '../utils/path.js';
import { Waiter } from '../utils/waiter.js';

export type SessionMode = { kind: 'play' } | { kind: 'script'; walkthrough: string };

export interface SessionOptions {
  config: AppConfig;
  mode: SessionMode;
  stdin?: Readable;
  stdout?: Writable;
  // Speech input, filtered by VOICE_MIN_CONFIDENCE.
  recognizer?: SpeechRecognizer;
  producers?: InputProducer[];
  logger?: Logger;
  handleSignals?: boolean;
}

export interface SessionOutcome {
  shutdown: ShutdownResult;
  exit?: WorkerExit;
  chunks: number;
}

export interface CliOverrides {
  story?: string;
  transcript?: string;
}

// --story implies the process interpreter.
export const applyCliOverrides = (config: AppConfig, overrides: CliOverrides): AppConfig => ({
  ...config,
  ...(overrides.story ? { ENGINE_MODE: 'process' as const, STORY_FILE: overrides.story } : {}),
  ...(overrides.transcript ? { TRANSCRIPT_FILE: overrides.transcript } : {}),
});

const runWithBundle = async <TState>(
  bundle: InterpreterBundle<TState>,
  options: SessionOptions,
  logger: Logger,
): Promise<SessionOutcome> => {
  const { config, mode } = options;
  const stdin = options.stdin ?? process.stdin;
  const stdout = options.stdout ?? process.stdout;
  const shutdownRequested = new Waiter<void>();

  const transcript = new Transcript({
    stream: stdout,
    file: resolvePath(config.TRANSCRIPT_FILE) || undefined,
    logger: logger.child('transcript'),
  });
  await transcript.open();

  const producers: InputProducer[] = [];
  if (mode.kind === 'play') {
    producers.push(
      new TerminalSession({
        input: stdin,
        output: stdout,
        historySize: config.INPUT_HISTORY_SIZE,
        terminal: stdin === process.stdin && Boolean(process.stdout.isTTY),
        status: () => controller.query(bundle.status),
        onQuit: () => shutdownRequested.resolve(),
        logger: logger.child('terminal'),
      }),
    );
  } else {
    producers.push(
      new ScriptProducer({
        file: mode.walkthrough,
        delayMs: config.SCRIPT_DELAY_MS,
        quitWhenDone: true,
        logger: logger.child('script'),
      }),
    );
  }
  if (options.recognizer) {
    producers.push(voiceProducerFor(config, options.recognizer, logger.child('voice')));
  }
  producers.push(...(options.producers ?? []));

  const controller = new LifecycleController<TState>({
    core: bundle.core,
    ...lifecycleSettings(config),
    producers,
    logger: logger.child('lifecycle'),
  });

  const pump = transcript.pump(controller.output).catch((error: unknown) => {
    logger.error('transcript failed', { error: errorMessage(error) });
    return transcript.chunksWritten;
  });

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, shutting down`);
    shutdownRequested.resolve();
  };
  if (options.handleSignals) {
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  }

  try {
    try {
      await controller.start();
    } catch (error) {
      await controller.shutdown();
      await pump;
      throw error;
    }
    logger.info(`session started with ${bundle.core.name}`);

    await Promise.race([controller.whenStopped(), shutdownRequested.promise]);
    const shutdown = await controller.shutdown();
    const chunks = await pump;
    return { shutdown, exit: shutdown.exit, chunks };
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await transcript.close();
  }
};

export const runSession = (options: SessionOptions): Promise<SessionOutcome> => {
  const logger = options.logger ?? new Logger('session', options.config.LOG_LEVEL);
  return withInterpreter<Promise<SessionOutcome>>(options.config, (bundle) => runWithBundle(bundle, options, logger), logger);
};
