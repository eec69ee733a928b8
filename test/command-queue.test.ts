import { describe, expect, it } from 'vitest';

import { BinaryHeap } from '../src/bridge/heap.js';
import { PriorityCommandQueue } from '../src/bridge/command-queue.js';
import { QueueClosedError, QueueFullError } from '../src/bridge/errors.js';
import { SYSTEM_PRIORITY, compareCommands, type Command, type CommandSource } from '../src/shared/protocol.js';

const texts = (commands: Command[]) => commands.map((command) => command.text);

describe('binary heap', () => {
  it('pops in comparator order', () => {
    const heap = new BinaryHeap<number>((a, b) => a - b);
    for (const value of [7, 3, 9, 1, 4, 1, 8]) {
      heap.push(value);
    }

    const popped: number[] = [];
    for (let value = heap.pop(); value !== undefined; value = heap.pop()) {
      popped.push(value);
    }

    expect(popped).toEqual([1, 1, 3, 4, 7, 8, 9]);
    expect(heap.size).toBe(0);
  });

  it('removes matching items and keeps the rest ordered', () => {
    const heap = new BinaryHeap<number>((a, b) => a - b);
    for (const value of [5, 2, 8, 3, 6]) {
      heap.push(value);
    }

    expect(heap.removeWhere((value) => value % 2 === 0)).toEqual([2, 6, 8]);
    expect(heap.toSortedArray()).toEqual([3, 5]);
    expect(heap.peek()).toBe(3);
  });
});

describe('priority command queue', () => {
  it('serves a higher-priority voice command before an earlier keyboard command', async () => {
    const queue = new PriorityCommandQueue(8);
    const look = await queue.enqueue('look', 'keyboard', 0);
    const inventory = await queue.enqueue('inventory', 'voice', 1);

    expect(look.sequence).toBe(0);
    expect(inventory.sequence).toBe(1);
    expect(await queue.dequeue()).toBe(inventory);
    expect(await queue.dequeue()).toBe(look);
  });

  it('keeps arrival order between equal priorities', async () => {
    const queue = new PriorityCommandQueue(8);
    for (const text of ['north', 'take lamp', 'south']) {
      queue.tryEnqueue(text, 'keyboard', 0);
    }

    expect(texts(queue.snapshot())).toEqual(['north', 'take lamp', 'south']);
    expect(queue.tryDequeue()?.text).toBe('north');
  });

  it('freezes commands', () => {
    const queue = new PriorityCommandQueue(1);
    const command = queue.tryEnqueue('look', 'keyboard', 0);
    expect(Object.isFrozen(command)).toBe(true);
  });

  it('holds a producer back while the queue is full and admits it after a dequeue', async () => {
    const queue = new PriorityCommandQueue(2);
    await queue.enqueue('a', 'keyboard', 0);
    await queue.enqueue('b', 'keyboard', 0);

    let admitted = false;
    const third = queue.enqueue('c', 'keyboard', 0).then((command) => {
      admitted = true;
      return command;
    });
    await Promise.resolve();

    expect(admitted).toBe(false);
    expect(queue.size()).toBe(2);
    expect(queue.waitingProducers()).toBe(1);
    expect(() => queue.tryEnqueue('d', 'keyboard', 0)).toThrow(QueueFullError);

    expect(queue.tryDequeue()?.text).toBe('a');
    const command = await third;
    expect(command.text).toBe('c');
    expect(command.sequence).toBe(2);
    expect(queue.size()).toBe(2);
    expect(queue.waitingProducers()).toBe(0);
  });

  it('admits waiting producers in arrival order', async () => {
    const queue = new PriorityCommandQueue(1);
    queue.tryEnqueue('first', 'keyboard', 0);
    const second = queue.enqueue('second', 'keyboard', 0);
    const third = queue.enqueue('third', 'voice', 5);

    expect(queue.waitingProducers()).toBe(2);
    queue.tryDequeue();
    expect((await second).sequence).toBe(1);
    expect(queue.waitingProducers()).toBe(1);

    expect(queue.tryDequeue()?.text).toBe('second');
    expect((await third).sequence).toBe(2);
  });

  it('admits a waiting system directive ahead of waiting game input', async () => {
    const queue = new PriorityCommandQueue(1);
    queue.tryEnqueue('look', 'keyboard', 0);
    const north = queue.enqueue('north', 'keyboard', 0);
    const east = queue.enqueue('east', 'voice', 1);
    const cancel = queue.enqueue('cancel', 'system', SYSTEM_PRIORITY);

    expect(queue.tryDequeue()?.text).toBe('look');
    expect((await cancel).sequence).toBe(1);
    expect(queue.tryDequeue()?.text).toBe('cancel');
    expect((await north).sequence).toBe(2);
    expect(queue.tryDequeue()?.text).toBe('north');
    expect((await east).sequence).toBe(3);
    expect(queue.tryDequeue()?.text).toBe('east');
  });

  it('hands out unique sequence numbers to concurrent producers', async () => {
    const queue = new PriorityCommandQueue(4);
    const producers = Array.from({ length: 50 }, (_, index) => queue.enqueue(`line ${index}`, index % 2 ? 'voice' : 'keyboard', 0));

    const consumed: Command[] = [];
    for (let index = 0; index < 50; index += 1) {
      consumed.push(await queue.dequeue());
    }
    await Promise.all(producers);

    const sequences = consumed.map((command) => command.sequence).sort((a, b) => a - b);
    expect(sequences).toEqual(Array.from({ length: 50 }, (_, index) => index));
    expect(queue.size()).toBe(0);
  });

  it('drops a waiting producer when its signal aborts', async () => {
    const queue = new PriorityCommandQueue(1);
    queue.tryEnqueue('look', 'keyboard', 0);
    const controller = new AbortController();
    const pending = queue.enqueue('wait', 'keyboard', 0, { signal: controller.signal });

    controller.abort(new Error('gave up'));

    await expect(pending).rejects.toThrow('gave up');
    expect(queue.waitingProducers()).toBe(0);
    queue.tryDequeue();
    expect(queue.size()).toBe(0);
  });

  it('purges matching commands and admits waiting producers into the room', async () => {
    const queue = new PriorityCommandQueue(3);
    queue.tryEnqueue('look', 'keyboard', 0);
    queue.tryEnqueue('inventory', 'voice', 1);
    queue.tryEnqueue('quit', 'system', SYSTEM_PRIORITY);
    const waiting = queue.enqueue('score', 'keyboard', 0);

    const removed = queue.purge((command) => command.source !== 'system');

    expect(texts(removed)).toEqual(['inventory', 'look']);
    expect((await waiting).text).toBe('score');
    expect(texts(queue.snapshot())).toEqual(['quit', 'score']);
  });

  it('rejects waiters and later producers once closed', async () => {
    const queue = new PriorityCommandQueue(1);
    queue.tryEnqueue('look', 'keyboard', 0);
    const waiting = queue.enqueue('north', 'keyboard', 0);

    const discarded = queue.close('session over');

    expect(texts(discarded)).toEqual(['look']);
    await expect(waiting).rejects.toThrow(QueueClosedError);
    await expect(waiting).rejects.toThrow('session over');
    await expect(queue.enqueue('south', 'keyboard', 0)).rejects.toBeInstanceOf(QueueClosedError);
    expect(() => queue.tryEnqueue('south', 'keyboard', 0)).toThrow(QueueClosedError);
    await expect(queue.dequeue()).rejects.toBeInstanceOf(QueueClosedError);
    expect(queue.close()).toEqual([]);
  });

  it('wakes a waiting consumer when a command arrives', async () => {
    const queue = new PriorityCommandQueue(2);
    const next = queue.dequeue();
    queue.tryEnqueue('wait', 'keyboard', 0);
    expect((await next).text).toBe('wait');
  });

  it('validates capacity and priority', async () => {
    expect(() => new PriorityCommandQueue(0)).toThrow(RangeError);
    const queue = new PriorityCommandQueue(2);
    await expect(queue.enqueue('look', 'keyboard', 1.5)).rejects.toThrow(RangeError);
    expect(() => queue.tryEnqueue('look', 'keyboard', Number.NaN)).toThrow(RangeError);
  });
});

// mulberry32, so every run replays the same interleaving
const seeded = (seed: number) => () => {
  seed = (seed + 0x6d2b79f5) | 0;
  let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
  t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
  return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
};

const GAME_SOURCES: CommandSource[] = ['keyboard', 'voice'];

describe('priority command queue under mixed load', () => {
  it('drains a full batch of mixed priorities in (priority desc, sequence asc) order', async () => {
    const random = seeded(7);
    const queue = new PriorityCommandQueue(100);
    const enqueued: Command[] = [];
    for (let index = 0; index < 80; index += 1) {
      const source = GAME_SOURCES[index % 2] ?? 'keyboard';
      enqueued.push(await queue.enqueue(`line ${index}`, source, Math.floor(random() * 6) - 2));
    }

    const out: Command[] = [];
    for (let command = queue.tryDequeue(); command; command = queue.tryDequeue()) {
      out.push(command);
    }

    expect(out).toEqual([...enqueued].sort(compareCommands));
    for (const [index, command] of out.entries()) {
      const next = out[index + 1];
      if (!next) break;
      expect(command.priority > next.priority || (command.priority === next.priority && command.sequence < next.sequence)).toBe(
        true,
      );
    }
  });

  it.each([1, 2, 3, 7, 100])('always serves the best queued command at capacity %i', async (capacity) => {
    const random = seeded(capacity);
    const queue = new PriorityCommandQueue(capacity);
    const admitted: Promise<Command>[] = [];
    const out: Command[] = [];

    const take = () => {
      const best = queue.snapshot()[0];
      const command = queue.tryDequeue();
      expect(command).toBe(best);
      if (command) out.push(command);
    };

    for (let index = 0; index < 300; index += 1) {
      if (random() < 0.6) {
        const source = GAME_SOURCES[Math.floor(random() * 2)] ?? 'keyboard';
        admitted.push(queue.enqueue(`line ${index}`, source, Math.floor(random() * 5)));
      } else {
        take();
      }
    }
    while (queue.size() > 0) {
      take();
    }

    const commands = await Promise.all(admitted);
    const bySequence = (a: Command, b: Command) => a.sequence - b.sequence;
    expect(queue.waitingProducers()).toBe(0);
    expect([...out].sort(bySequence)).toEqual([...commands].sort(bySequence));
    expect(new Set(out.map((command) => command.sequence)).size).toBe(commands.length);
  });
});
