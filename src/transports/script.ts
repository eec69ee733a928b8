import fs from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { QueueClosedError, errorMessage } from '../bridge/errors.js';
import type { CommandSink, InputProducer } from '../control/lifecycle.js';
import { Logger } from '../utils/logger.js';

export const parseWalkthrough = (raw: string): string[] =>
  raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));

export interface ScriptProducerOptions {
  file?: string;
  lines?: string[];
  delayMs: number;
  quitWhenDone: boolean;
  logger?: Logger;
}

export interface ScriptReport {
  submitted: number;
  rejected: number;
  completed: boolean;
}

export class ScriptProducer implements InputProducer {
  readonly name = 'script';
  private readonly logger: Logger;
  private readonly abort = new AbortController();
  private playing: Promise<ScriptReport> | null = null;

  constructor(private readonly options: ScriptProducerOptions) {
    this.logger = options.logger ?? new Logger('script');
  }

  async start(sink: CommandSink) {
    if (this.playing) return;
    const lines = this.options.lines ?? (await this.load());
    this.logger.info(`replaying ${lines.length} line(s)`);
    this.playing = this.play(sink, lines);
  }

  stop() {
    if (!this.abort.signal.aborted) {
      this.abort.abort(new Error('script producer stopped'));
    }
  }

  whenDone(): Promise<ScriptReport> {
    return this.playing ?? Promise.resolve({ submitted: 0, rejected: 0, completed: false });
  }

  private async load() {
    if (!this.options.file) {
      throw new Error('script producer needs a walkthrough file or lines');
    }
    return parseWalkthrough(await fs.readFile(this.options.file, 'utf8'));
  }

  private async play(sink: CommandSink, lines: string[]): Promise<ScriptReport> {
    const report: ScriptReport = { submitted: 0, rejected: 0, completed: false };
    const signal = this.abort.signal;

    try {
      for (const [index, line] of lines.entries()) {
        if (index > 0 && this.options.delayMs > 0) {
          await sleep(this.options.delayMs, undefined, { signal });
        }
        signal.throwIfAborted();
        const result = await sink.submit(line, 'keyboard', { signal });
        if (result.accepted) {
          report.submitted += 1;
        } else {
          report.rejected += 1;
          this.logger.warn(`walkthrough line ${index + 1} rejected: ${result.reason}`);
        }
      }

      if (this.options.quitWhenDone) {
        // quit outranks game input, so wait until the last line has been consumed.
        await sink.whenIdle();
        signal.throwIfAborted();
        await sink.control('quit', { signal });
      }
      report.completed = true;
    } catch (error) {
      if (signal.aborted) {
        this.logger.info('walkthrough interrupted', { submitted: report.submitted });
      } else if (error instanceof QueueClosedError) {
        this.logger.info('engine stopped before the walkthrough finished', { submitted: report.submitted });
      } else {
        this.logger.error('walkthrough failed', { error: errorMessage(error) });
      }
    }

    return report;
  }
}
