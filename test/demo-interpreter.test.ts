import { describe, expect, it } from 'vitest';

import { DEMO_PROMPT, DemoInterpreter, demoQueries, type DemoState } from '../src/engine/demo.js';

const FOYER = 'Foyer\nA dusty foyer. A corridor leads north and the cloakroom lies to the west.\n';

/** Steps until the interpreter wants input or halts, joining the output. */
const run = (core: DemoInterpreter, state: DemoState) => {
  const output: string[] = [];
  for (;;) {
    const result = core.step(state);
    if (result.output) output.push(result.output);
    if (result.kind !== 'continue') return { kind: result.kind, text: output.join('') };
  }
};

const turn = (core: DemoInterpreter, state: DemoState, line: string) => {
  core.feedLine(state, line);
  return run(core, state);
};

describe('demo interpreter', () => {
  it('greets the player and asks for input', () => {
    const core = new DemoInterpreter();
    const state = core.createState();

    expect(core.step(state)).toEqual({
      kind: 'continue',
      output: 'Welcome to the demo house. Type "help" for a list of verbs.\n\n',
    });
    expect(run(core, state)).toEqual({ kind: 'input', text: `${FOYER}You can see: umbrella.\n${DEMO_PROMPT}` });
  });

  it('moves, takes items and keeps score', () => {
    const core = new DemoInterpreter();
    const state = core.createState();
    run(core, state);

    expect(turn(core, state, 'take umbrella').text).toBe('Taken: umbrella.\n> ');
    expect(turn(core, state, 'go west').text).toBe(
      'Cloakroom\nRows of empty hooks line the walls. The foyer is back to the east.\nYou can see: cloak.\n> ',
    );
    expect(turn(core, state, 'i').text).toBe('You are carrying: umbrella.\n> ');
    expect(turn(core, state, 'drop umbrella').text).toBe('Dropped: umbrella.\n> ');
    expect(turn(core, state, 'take umbrella').text).toBe('Taken: umbrella.\n> ');
    expect(turn(core, state, 'score').text).toBe('Your score is 5 of 20 in 4 turn(s).\n> ');
  });

  it('undoes the previous turn', () => {
    const core = new DemoInterpreter();
    const state = core.createState();
    run(core, state);
    turn(core, state, 'take umbrella');
    turn(core, state, 'w');

    expect(turn(core, state, 'undo').text).toBe(`Undone. ${FOYER}> `);
    expect(demoQueries.status(state)).toMatchObject({ location: 'Foyer', turns: 1, score: 5, inventory: ['umbrella'] });
    expect(turn(core, state, 'undo').text).toBe(`Undone. ${FOYER}You can see: umbrella.\n> `);
    expect(turn(core, state, 'undo').text).toBe("You can't undo any further.\n> ");
  });

  it('answers what it cannot do', () => {
    const core = new DemoInterpreter();
    const state = core.createState();
    run(core, state);

    expect(turn(core, state, 'xyzzy').text).toBe("I don't understand that.\n> ");
    expect(turn(core, state, 'go').text).toBe('Go where?\n> ');
    expect(turn(core, state, 'east').text).toBe("You can't do that.\n> ");
    expect(turn(core, state, 'take piano').text).toBe("You can't do that.\n> ");
    expect(turn(core, state, '').text).toBe('I beg your pardon?\n> ');
    expect(state.turns).toBe(0);
  });

  it('halts after quit', () => {
    const core = new DemoInterpreter();
    const state = core.createState();
    run(core, state);
    turn(core, state, 'n');

    expect(turn(core, state, 'quit')).toEqual({ kind: 'halt', text: 'Final score: 0 in 1 turn(s). Goodbye.\n' });
  });

  it('exposes read-only views through its queries', () => {
    const core = new DemoInterpreter();
    const state = core.createState();
    run(core, state);
    turn(core, state, 'north');

    expect(demoQueries.room(state)).toEqual({ id: 'hall', title: 'Hall', exits: ['east', 'south'], items: ['lamp'] });
    expect(demoQueries.inventory(state)).toEqual([]);
    expect(demoQueries.status(state)).toEqual({
      engine: 'demo',
      location: 'Hall',
      turns: 1,
      score: 0,
      inventory: [],
      details: { quitting: false, undoDepth: 1 },
    });
  });
});
