import { describe, expect, it } from 'vitest';

import { parseAppConfig } from '../src/config.js';
import { lifecycleSettings } from '../src/control/lifecycle.js';
import { applyCliOverrides } from '../src/runtime/session.js';

describe('config schema', () => {
  it('parses defaults and coerces numbers', () => {
    const parsed = parseAppConfig({ COMMAND_QUEUE_CAPACITY: '8', PRIORITY_VOICE: '3' }, {});

    expect(parsed.ENGINE_MODE).toBe('demo');
    expect(parsed.LOG_LEVEL).toBe('warn');
    expect(parsed.COMMAND_QUEUE_CAPACITY).toBe(8);
    expect(parsed.OUTPUT_CHANNEL_CAPACITY).toBe(256);
    expect(lifecycleSettings(parsed)).toEqual({
      commandCapacity: 8,
      outputCapacity: 256,
      shutdownTimeoutMs: 3000,
      forceStopGraceMs: 1000,
      priorities: { keyboard: 0, voice: 3 },
      maxInputBytes: 1024,
    });
  });

  it('fails on unknown keys found in .env', () => {
    expect(() =>
      parseAppConfig({}, {
        COMMAND_QUEUE_CAPACITY: '16',
        COMMAND_QUEUE_CAPACTY: '32',
      }),
    ).toThrow(/COMMAND_QUEUE_CAPACTY/);
  });

  it('rejects a capacity below one', () => {
    expect(() => parseAppConfig({ OUTPUT_CHANNEL_CAPACITY: '0' }, {})).toThrow(/OUTPUT_CHANNEL_CAPACITY/);
  });

  it('rejects an unknown engine mode', () => {
    expect(() => parseAppConfig({ ENGINE_MODE: 'glulx' }, {})).toThrow(/ENGINE_MODE/);
  });

  it('requires a story file in process mode', () => {
    expect(() => parseAppConfig({ ENGINE_MODE: 'process', ENGINE_COMMAND: 'dfrotz' }, {})).toThrow(/STORY_FILE/);
    expect(() => parseAppConfig({ ENGINE_MODE: 'process', ENGINE_COMMAND: ' ', STORY_FILE: 'a.z5' }, {})).toThrow(
      /ENGINE_COMMAND/,
    );
  });

  it('lets command-line flags pick the story and transcript', () => {
    const parsed = parseAppConfig({}, {});

    const overridden = applyCliOverrides(parsed, { story: 'stories/cellar.z5', transcript: 'logs/session.txt' });

    expect(overridden.ENGINE_MODE).toBe('process');
    expect(overridden.STORY_FILE).toBe('stories/cellar.z5');
    expect(overridden.TRANSCRIPT_FILE).toBe('logs/session.txt');
    expect(applyCliOverrides(parsed, { story: '', transcript: '' })).toEqual(parsed);
  });
});
