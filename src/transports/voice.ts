import type { EventEmitter } from 'node:events';
import type { AppConfig } from '../config.js';
import { QueueClosedError, errorMessage } from '../bridge/errors.js';
import type { CommandSink, InputProducer } from '../control/lifecycle.js';
import { Logger } from '../utils/logger.js';

export interface RecognizedPhrase {
  text: string;
  confidence: number;
}

export interface SpeechRecognizer extends EventEmitter {
  start?(): void | Promise<void>;
  stop?(): void | Promise<void>;
}

export interface VoiceProducerOptions {
  recognizer: SpeechRecognizer;
  minConfidence: number;
  logger?: Logger;
}

export interface VoiceStats {
  heard: number;
  submitted: number;
  dropped: number;
}

const isRecognizedPhrase = (value: unknown): value is RecognizedPhrase => {
  if (!value || typeof value !== 'object') return false;
  return (
    'text' in value &&
    typeof value.text === 'string' &&
    'confidence' in value &&
    typeof value.confidence === 'number'
  );
};

export class VoiceProducer implements InputProducer {
  readonly name = 'voice';
  private readonly logger: Logger;
  private sink: CommandSink | null = null;
  private readonly counters: VoiceStats = { heard: 0, submitted: 0, dropped: 0 };
  private readonly inflight = new Set<Promise<void>>();

  private readonly onPhrase = (phrase: unknown) => {
    const task = this.handlePhrase(phrase).finally(() => this.inflight.delete(task));
    this.inflight.add(task);
  };

  private readonly onError = (error: unknown) => {
    this.logger.warn('speech recognizer error', { error: errorMessage(error) });
  };

  constructor(private readonly options: VoiceProducerOptions) {
    this.logger = options.logger ?? new Logger('voice');
  }

  stats(): VoiceStats {
    return { ...this.counters };
  }

  async settled() {
    await Promise.all([...this.inflight]);
  }

  async start(sink: CommandSink) {
    if (this.sink) return;
    this.sink = sink;
    this.options.recognizer.on('phrase', this.onPhrase);
    this.options.recognizer.on('error', this.onError);
    await this.options.recognizer.start?.();
  }

  async stop() {
    if (!this.sink) return;
    this.sink = null;
    this.options.recognizer.off('phrase', this.onPhrase);
    this.options.recognizer.off('error', this.onError);
    await this.options.recognizer.stop?.();
  }

  private async handlePhrase(phrase: unknown) {
    const sink = this.sink;
    if (!sink) return;
    this.counters.heard += 1;

    if (!isRecognizedPhrase(phrase)) {
      this.counters.dropped += 1;
      this.logger.warn('ignoring malformed phrase event');
      return;
    }
    if (phrase.confidence < this.options.minConfidence) {
      this.counters.dropped += 1;
      this.logger.debug('phrase below confidence threshold', { text: phrase.text, confidence: phrase.confidence });
      return;
    }

    try {
      const result = await sink.submit(phrase.text, 'voice');
      if (result.accepted) {
        this.counters.submitted += 1;
      } else {
        this.counters.dropped += 1;
      }
    } catch (error) {
      this.counters.dropped += 1;
      if (error instanceof QueueClosedError) {
        this.logger.debug('phrase dropped after shutdown', { text: phrase.text });
        return;
      }
      this.logger.error('voice submit failed', { error: errorMessage(error) });
    }
  }
}

export const voiceProducerFor = (config: AppConfig, recognizer: SpeechRecognizer, logger?: Logger) =>
  new VoiceProducer({ recognizer, minConfidence: config.VOICE_MIN_CONFIDENCE, logger });
