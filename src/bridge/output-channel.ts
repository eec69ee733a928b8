import { QueueClosedError } from './errors.js';
import { assertCapacity } from './command-queue.js';
import { END_OF_STREAM, isEndOfStream, type OutputChunk, type OutputRead, type WaitOptions } from '../shared/protocol.js';
import { Waiter, removeWaiter } from '../utils/waiter.js';

interface PendingWriter {
  chunk: OutputChunk;
  waiter: Waiter<void>;
}

// Writers already waiting when close() is called are still delivered before END_OF_STREAM.
export class OutputChannel implements AsyncIterable<OutputChunk> {
  private readonly buffer: OutputChunk[] = [];
  private readonly writers: PendingWriter[] = [];
  private readonly readers: Waiter<OutputRead>[] = [];
  private isClosed = false;
  private endDelivered = false;

  constructor(readonly capacity: number) {
    assertCapacity(capacity, 'output channel');
  }

  get closed() {
    return this.isClosed;
  }

  get ended() {
    return this.endDelivered;
  }

  size() {
    return this.buffer.length;
  }

  async write(chunk: OutputChunk, options: WaitOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();
    if (this.isClosed) throw new QueueClosedError('output channel is closed');

    const reader = this.buffer.length === 0 ? this.readers.shift() : undefined;
    if (reader) {
      reader.resolve(chunk);
      return;
    }

    if (this.buffer.length < this.capacity && this.writers.length === 0) {
      this.buffer.push(chunk);
      return;
    }

    const pending: PendingWriter = {
      chunk,
      waiter: new Waiter<void>(options.signal, () => {
        removeWaiter(this.writers, pending);
        this.settleReaders();
      }),
    };
    this.writers.push(pending);
    return pending.waiter.promise;
  }

  close() {
    if (this.isClosed) return;
    this.isClosed = true;
    this.settleReaders();
  }

  tryRead(): OutputRead | undefined {
    const chunk = this.buffer.shift();
    if (chunk) {
      this.admitWriters();
      return chunk;
    }
    if (this.isClosed && this.writers.length === 0) {
      this.endDelivered = true;
      return END_OF_STREAM;
    }
    return undefined;
  }

  read(options: WaitOptions = {}): Promise<OutputRead> {
    if (options.signal?.aborted) return Promise.reject(options.signal.reason);
    const next = this.tryRead();
    if (next !== undefined) return Promise.resolve(next);

    const waiter: Waiter<OutputRead> = new Waiter<OutputRead>(options.signal, () => removeWaiter(this.readers, waiter));
    this.readers.push(waiter);
    return waiter.promise;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<OutputChunk, void, undefined> {
    for (;;) {
      const next = await this.read();
      if (isEndOfStream(next)) return;
      yield next;
    }
  }

  private admitWriters() {
    while (this.buffer.length < this.capacity && this.writers.length > 0) {
      const pending = this.writers.shift();
      if (!pending) return;
      this.buffer.push(pending.chunk);
      pending.waiter.resolve();
    }
  }

  private settleReaders() {
    if (!this.isClosed || this.buffer.length > 0 || this.writers.length > 0) return;
    for (const reader of this.readers.splice(0)) {
      this.endDelivered = true;
      reader.resolve(END_OF_STREAM);
    }
  }
}
