import { BinaryHeap } from './heap.js';
import { QueueClosedError, QueueFullError } from './errors.js';
import { compareCommands, createCommand, type Command, type CommandSource, type WaitOptions } from '../shared/protocol.js';
import { Waiter, removeWaiter } from '../utils/waiter.js';

interface PendingProducer {
  text: string;
  source: CommandSource;
  priority: number;
  waiter: Waiter<Command>;
}

export const assertCapacity = (capacity: number, label: string) => {
  if (!Number.isSafeInteger(capacity) || capacity <= 0) {
    throw new RangeError(`${label} capacity must be a positive integer, got ${capacity}`);
  }
};

const assertPriority = (priority: number) => {
  if (!Number.isSafeInteger(priority)) {
    throw new RangeError(`command priority must be a safe integer, got ${priority}`);
  }
};

// Commands come out in (priority desc, sequence asc) order. Producers that find
// the queue full are admitted in arrival order, except that waiting system
// directives go first. One consumer.
export class PriorityCommandQueue {
  private readonly heap = new BinaryHeap<Command>(compareCommands);
  private readonly producers: PendingProducer[] = [];
  private readonly watchers: Waiter<void>[] = [];
  private nextSequence = 0;
  private isClosed = false;

  constructor(readonly capacity: number) {
    assertCapacity(capacity, 'command queue');
  }

  get closed() {
    return this.isClosed;
  }

  size() {
    return this.heap.size;
  }

  waitingProducers() {
    return this.producers.length;
  }

  tryEnqueue(text: string, source: CommandSource, priority: number): Command {
    assertPriority(priority);
    if (this.isClosed) throw new QueueClosedError('command queue is closed');
    if (this.heap.size >= this.capacity || this.producers.length > 0) {
      throw new QueueFullError(this.capacity);
    }
    return this.insert(text, source, priority);
  }

  async enqueue(text: string, source: CommandSource, priority: number, options: WaitOptions = {}): Promise<Command> {
    options.signal?.throwIfAborted();
    assertPriority(priority);
    if (this.isClosed) throw new QueueClosedError('command queue is closed');
    if (this.heap.size < this.capacity && this.producers.length === 0) {
      return this.insert(text, source, priority);
    }

    const pending: PendingProducer = {
      text,
      source,
      priority,
      waiter: new Waiter<Command>(options.signal, () => removeWaiter(this.producers, pending)),
    };
    this.producers.push(pending);
    return pending.waiter.promise;
  }

  peek(): Command | undefined {
    return this.heap.peek();
  }

  tryDequeue(): Command | undefined {
    const command = this.heap.pop();
    if (command) this.admitProducers();
    return command;
  }

  async dequeue(options: WaitOptions = {}): Promise<Command> {
    for (;;) {
      const command = this.tryDequeue();
      if (command) return command;
      await this.whenAvailable(options);
    }
  }

  whenAvailable(options: WaitOptions = {}): Promise<void> {
    if (options.signal?.aborted) return Promise.reject(options.signal.reason);
    if (this.heap.size > 0) return Promise.resolve();
    if (this.isClosed) return Promise.reject(new QueueClosedError('command queue is closed'));

    const waiter: Waiter<void> = new Waiter<void>(options.signal, () => removeWaiter(this.watchers, waiter));
    this.watchers.push(waiter);
    return waiter.promise;
  }

  purge(predicate: (command: Command) => boolean): Command[] {
    const removed = this.heap.removeWhere(predicate);
    if (removed.length > 0) this.admitProducers();
    return removed;
  }

  snapshot(): Command[] {
    return this.heap.toSortedArray();
  }

  close(message = 'command queue is closed'): Command[] {
    if (this.isClosed) return [];
    this.isClosed = true;

    const discarded = this.heap.toSortedArray();
    this.heap.clear();
    for (const pending of this.producers.splice(0)) {
      pending.waiter.reject(new QueueClosedError(message));
    }
    for (const waiter of this.watchers.splice(0)) {
      waiter.reject(new QueueClosedError(message));
    }
    return discarded;
  }

  private insert(text: string, source: CommandSource, priority: number) {
    const command = createCommand(text, source, priority, this.nextSequence);
    this.nextSequence += 1;
    this.heap.push(command);
    for (const waiter of this.watchers.splice(0)) {
      waiter.resolve();
    }
    return command;
  }

  private admitProducers() {
    while (this.heap.size < this.capacity && this.producers.length > 0) {
      const system = this.producers.findIndex((pending) => pending.source === 'system');
      const [pending] = this.producers.splice(system >= 0 ? system : 0, 1);
      if (!pending) return;
      pending.waiter.resolve(this.insert(pending.text, pending.source, pending.priority));
    }
  }
}
