import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { QueueClosedError, errorMessage } from '../bridge/errors.js';
import type { CommandSink, InputProducer } from '../control/lifecycle.js';
import type { StatusSnapshot } from '../engine/types.js';
import { Logger } from '../utils/logger.js';

export type MetaCommand = 'status' | 'undo' | 'cancel' | 'quit';

const META_COMMANDS: Record<string, MetaCommand> = {
  ':status': 'status',
  ':undo': 'undo',
  ':cancel': 'cancel',
  ':quit': 'quit',
};

export const parseMetaCommand = (line: string): MetaCommand | null => META_COMMANDS[line.toLowerCase()] ?? null;

export const formatStatus = (status: StatusSnapshot) => {
  const lines = [
    `engine:    ${status.engine}`,
    `location:  ${status.location}`,
    `turns:     ${status.turns}`,
  ];
  if (status.score !== undefined) {
    lines.push(`score:     ${status.score}`);
  }
  lines.push(`inventory: ${status.inventory.length > 0 ? status.inventory.join(', ') : '(nothing)'}`);
  for (const [key, value] of Object.entries(status.details)) {
    lines.push(`${key}: ${String(value)}`);
  }
  return `${lines.map((line) => `  ${line}`).join('\n')}\n`;
};

export interface TerminalSessionOptions {
  input: Readable;
  output: Writable;
  historySize: number;
  terminal?: boolean;
  status: () => Promise<StatusSnapshot>;
  onQuit: () => void;
  logger?: Logger;
}

export class TerminalSession implements InputProducer {
  readonly name = 'keyboard';
  private readonly logger: Logger;
  private rl: readline.Interface | null = null;
  private stopping = false;

  constructor(private readonly options: TerminalSessionOptions) {
    this.logger = options.logger ?? new Logger('terminal');
  }

  start(sink: CommandSink) {
    if (this.rl) return;
    this.stopping = false;
    const rl = readline.createInterface({
      input: this.options.input,
      output: this.options.output,
      terminal: this.options.terminal ?? false,
      historySize: this.options.historySize,
    });
    rl.on('line', (line) => {
      void this.handleLine(sink, line);
    });
    rl.on('close', () => {
      this.rl = null;
      if (!this.stopping) {
        this.logger.info('input closed');
        this.options.onQuit();
      }
    });
    this.rl = rl;
  }

  stop() {
    this.stopping = true;
    this.rl?.close();
    this.rl = null;
  }

  async handleLine(sink: CommandSink, raw: string) {
    const line = raw.trim();
    if (!line) return;

    try {
      const meta = parseMetaCommand(line);
      if (meta === 'status') {
        this.print(formatStatus(await this.options.status()));
        return;
      }
      if (meta === 'quit') {
        this.options.onQuit();
        return;
      }
      if (meta) {
        await sink.control(meta);
        return;
      }

      const result = await sink.submit(line, 'keyboard');
      if (!result.accepted) {
        this.print(`[input rejected: ${result.reason}]\n`);
      }
    } catch (error) {
      if (error instanceof QueueClosedError) {
        this.logger.debug('line dropped after shutdown', { line });
        return;
      }
      this.logger.error('terminal input failed', { error: errorMessage(error) });
      this.print(`[${errorMessage(error)}]\n`);
    }
  }

  private print(text: string) {
    this.options.output.write(text);
  }
}
