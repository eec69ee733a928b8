import type { Query } from '../bridge/introspection.js';
import type { InterpreterBundle, InterpreterCore, StatusSnapshot, StepResult } from './types.js';

type Direction = 'north' | 'south' | 'east' | 'west';

interface Room {
  title: string;
  description: string;
  exits: Partial<Record<Direction, string>>;
  items: string[];
}

const WORLD: Record<string, Room> = {
  foyer: {
    title: 'Foyer',
    description: 'A dusty foyer. A corridor leads north and the cloakroom lies to the west.',
    exits: { north: 'hall', west: 'cloakroom' },
    items: ['umbrella'],
  },
  cloakroom: {
    title: 'Cloakroom',
    description: 'Rows of empty hooks line the walls. The foyer is back to the east.',
    exits: { east: 'foyer' },
    items: ['cloak'],
  },
  hall: {
    title: 'Hall',
    description: 'A long hall with a cold fireplace. A door stands open to the east; the foyer is south.',
    exits: { south: 'foyer', east: 'study' },
    items: ['lamp'],
  },
  study: {
    title: 'Study',
    description: 'Bookshelves, a desk, and the smell of old paper. The hall is west.',
    exits: { west: 'hall' },
    items: ['key'],
  },
};

const START_ROOM = 'foyer';
const POINTS_PER_ITEM = 5;
const MAX_SCORE = Object.values(WORLD).reduce((total, room) => total + room.items.length, 0) * POINTS_PER_ITEM;
export const DEMO_PROMPT = '> ';

const DIRECTION_ALIASES: Record<string, Direction> = {
  n: 'north',
  north: 'north',
  s: 'south',
  south: 'south',
  e: 'east',
  east: 'east',
  w: 'west',
  west: 'west',
};

interface WorldSnapshot {
  room: string;
  inventory: string[];
  itemsAt: Record<string, string[]>;
  scored: string[];
  turns: number;
  score: number;
}

export interface DemoState extends WorldSnapshot {
  pending: string[];
  quitting: boolean;
  undo: WorldSnapshot[];
}

const snapshotOf = (state: DemoState): WorldSnapshot =>
  structuredClone({
    room: state.room,
    inventory: state.inventory,
    itemsAt: state.itemsAt,
    scored: state.scored,
    turns: state.turns,
    score: state.score,
  });

const roomOf = (state: Readonly<DemoState>) => {
  const room = WORLD[state.room];
  if (!room) throw new Error(`unknown room ${state.room}`);
  return room;
};

const describeRoom = (state: Readonly<DemoState>) => {
  const room = roomOf(state);
  const items = state.itemsAt[state.room] ?? [];
  const lines = [room.title, room.description];
  if (items.length > 0) {
    lines.push(`You can see: ${items.join(', ')}.`);
  }
  return `${lines.join('\n')}\n`;
};

export class DemoInterpreter implements InterpreterCore<DemoState> {
  readonly name = 'demo';

  createState(): DemoState {
    const itemsAt: Record<string, string[]> = {};
    for (const [id, room] of Object.entries(WORLD)) {
      itemsAt[id] = [...room.items];
    }

    const state: DemoState = {
      room: START_ROOM,
      inventory: [],
      itemsAt,
      scored: [],
      turns: 0,
      score: 0,
      pending: [],
      quitting: false,
      undo: [],
    };
    state.pending.push('Welcome to the demo house. Type "help" for a list of verbs.\n\n', describeRoom(state), DEMO_PROMPT);
    return state;
  }

  step(state: DemoState): StepResult {
    const output = state.pending.shift();
    if (state.pending.length > 0) {
      return { kind: 'continue', output };
    }
    return state.quitting ? { kind: 'halt', output } : { kind: 'input', output };
  }

  feedLine(state: DemoState, line: string) {
    const words = line.trim().toLowerCase().split(/\s+/).filter(Boolean);
    const reply = this.perform(state, words);
    state.pending.push(reply);
    if (!state.quitting) {
      state.pending.push(DEMO_PROMPT);
    }
  }

  private perform(state: DemoState, words: string[]): string {
    const [verb = '', ...rest] = words;
    const object = rest.join(' ');

    if (!verb) return 'I beg your pardon?\n';

    const direction = DIRECTION_ALIASES[verb] ?? (verb === 'go' ? DIRECTION_ALIASES[object] : undefined);
    if (direction) {
      return this.turn(state, () => this.move(state, direction));
    }

    switch (verb) {
      case 'go':
        return 'Go where?\n';
      case 'l':
      case 'look':
        return describeRoom(state);
      case 'i':
      case 'inventory':
        return state.inventory.length > 0 ? `You are carrying: ${state.inventory.join(', ')}.\n` : 'You are empty-handed.\n';
      case 'take':
      case 'get':
        return object ? this.turn(state, () => this.take(state, object)) : 'Take what?\n';
      case 'drop':
        return object ? this.turn(state, () => this.drop(state, object)) : 'Drop what?\n';
      case 'score':
        return `Your score is ${state.score} of ${MAX_SCORE} in ${state.turns} turn(s).\n`;
      case 'undo':
        return this.undo(state);
      case 'help':
        return 'Verbs: look, inventory, go <direction>, take <item>, drop <item>, score, undo, quit.\n';
      case 'q':
      case 'quit':
        state.quitting = true;
        return `Final score: ${state.score} in ${state.turns} turn(s). Goodbye.\n`;
      default:
        return "I don't understand that.\n";
    }
  }

  private turn(state: DemoState, action: () => string | null): string {
    const before = snapshotOf(state);
    const reply = action();
    if (reply === null) return "You can't do that.\n";
    state.undo.push(before);
    state.turns += 1;
    return reply;
  }

  private move(state: DemoState, direction: Direction) {
    const target = roomOf(state).exits[direction];
    if (!target) return null;
    state.room = target;
    return describeRoom(state);
  }

  private take(state: DemoState, item: string) {
    const here = state.itemsAt[state.room] ?? [];
    const index = here.indexOf(item);
    if (index < 0) return null;
    here.splice(index, 1);
    state.inventory.push(item);
    if (!state.scored.includes(item)) {
      state.scored.push(item);
      state.score += POINTS_PER_ITEM;
    }
    return `Taken: ${item}.\n`;
  }

  private drop(state: DemoState, item: string) {
    const index = state.inventory.indexOf(item);
    if (index < 0) return null;
    state.inventory.splice(index, 1);
    (state.itemsAt[state.room] ??= []).push(item);
    return `Dropped: ${item}.\n`;
  }

  private undo(state: DemoState) {
    const previous = state.undo.pop();
    if (!previous) return "You can't undo any further.\n";
    Object.assign(state, previous);
    return `Undone. ${describeRoom(state)}`;
  }
}

export interface DemoRoomView {
  id: string;
  title: string;
  exits: string[];
  items: string[];
}

export const demoQueries = {
  status: ((state) => ({
    engine: 'demo',
    location: roomOf(state).title,
    turns: state.turns,
    score: state.score,
    inventory: [...state.inventory],
    details: { quitting: state.quitting, undoDepth: state.undo.length },
  })) satisfies Query<DemoState, StatusSnapshot>,
  room: ((state) => ({
    id: state.room,
    title: roomOf(state).title,
    exits: Object.keys(roomOf(state).exits).sort(),
    items: [...(state.itemsAt[state.room] ?? [])],
  })) satisfies Query<DemoState, DemoRoomView>,
  inventory: ((state) => [...state.inventory]) satisfies Query<DemoState, string[]>,
};

export const createDemoBundle = (): InterpreterBundle<DemoState> => ({
  core: new DemoInterpreter(),
  status: demoQueries.status,
});
