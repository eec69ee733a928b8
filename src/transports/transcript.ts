import fs from 'node:fs';
import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { errorMessage } from '../bridge/errors.js';
import type { OutputChannel } from '../bridge/output-channel.js';
import type { OutputChunk } from '../shared/protocol.js';
import { Logger } from '../utils/logger.js';
import { ensureParentDir } from '../utils/path.js';

export interface TranscriptOptions {
  stream: Writable;
  // Tee target; a file that fails is dropped and the stream keeps going.
  file?: string;
  logger?: Logger;
}

export const formatChunk = (chunk: OutputChunk) => {
  if (chunk.tag === 'text') return chunk.text;
  const body = chunk.text.endsWith('\n') ? chunk.text : `${chunk.text}\n`;
  return `[${chunk.tag}] ${body}`;
};

const writeWithBackpressure = async (stream: Writable, text: string) => {
  if (!stream.write(text)) {
    await once(stream, 'drain');
  }
};

export class Transcript {
  private readonly logger: Logger;
  private fileStream: fs.WriteStream | null = null;
  private written = 0;

  constructor(private readonly options: TranscriptOptions) {
    this.logger = options.logger ?? new Logger('transcript');
  }

  get chunksWritten() {
    return this.written;
  }

  async open() {
    if (!this.options.file || this.fileStream) return;
    await ensureParentDir(this.options.file);
    const file = fs.createWriteStream(this.options.file, { flags: 'a', encoding: 'utf8' });
    file.on('error', (error) => this.dropFile(file, error));
    this.fileStream = file;
    this.logger.info(`teeing transcript to ${this.options.file}`);
  }

  async append(chunk: OutputChunk) {
    const text = formatChunk(chunk);
    await writeWithBackpressure(this.options.stream, text);
    const file = this.fileStream;
    if (file && !file.destroyed) {
      try {
        await writeWithBackpressure(file, text);
      } catch (error) {
        this.dropFile(file, error);
      }
    }
    this.written += 1;
  }

  async pump(channel: OutputChannel): Promise<number> {
    let count = 0;
    for await (const chunk of channel) {
      await this.append(chunk);
      count += 1;
    }
    return count;
  }

  async close() {
    const file = this.fileStream;
    if (!file) return;
    this.fileStream = null;
    await new Promise<void>((resolve) => {
      file.end(() => resolve());
    });
  }

  private dropFile(file: fs.WriteStream, error: unknown) {
    if (this.fileStream !== file) return;
    this.fileStream = null;
    file.destroy();
    this.logger.error(`transcript file ${this.options.file} failed, continuing without it`, { error: errorMessage(error) });
  }
}
