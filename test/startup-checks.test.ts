import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';

import { parseAppConfig, type AppConfig } from '../src/config.js';
import {
  StartupValidationError,
  commandExists,
  formatStartupIssue,
  validateStartupConfig,
  validateStartupConfigOrThrow,
} from '../src/utils/startup.js';

const scratch = fs.mkdtempSync(path.join(os.tmpdir(), 'ifbridge-check-'));
const storyFile = path.join(scratch, 'cellar.z5');
fs.writeFileSync(storyFile, 'not really a story');

afterAll(() => {
  fs.rmSync(scratch, { recursive: true, force: true });
});

const baseConfig = parseAppConfig({}, {});

const processConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  ...baseConfig,
  ENGINE_MODE: 'process',
  ENGINE_COMMAND: process.execPath,
  STORY_FILE: storyFile,
  ...overrides,
});

describe('startup validation', () => {
  it('accepts the default demo configuration', () => {
    expect(validateStartupConfig(baseConfig)).toEqual([]);
  });

  it('accepts an installed interpreter with an existing story file', () => {
    expect(validateStartupConfig(processConfig())).toEqual([]);
  });

  it('errors when process mode has an empty command', () => {
    const issues = validateStartupConfig(processConfig({ ENGINE_COMMAND: '' }));

    const issue = issues.find((entry) => entry.code === 'missing_engine_command');
    expect(issue?.severity).toBe('error');
    expect(issue ? formatStartupIssue(issue) : '').toContain('Remediation:');
  });

  it('errors when the interpreter is not on PATH', () => {
    const issues = validateStartupConfig(processConfig({ ENGINE_COMMAND: 'ifbridge-interpreter-that-does-not-exist' }));

    expect(issues.find((entry) => entry.code === 'engine_command_not_found')?.severity).toBe('error');
  });

  it('errors when the story file is missing', () => {
    const issues = validateStartupConfig(processConfig({ STORY_FILE: path.join(scratch, 'missing.z5') }));

    const issue = issues.find((entry) => entry.code === 'story_file_not_found');
    expect(issue?.severity).toBe('error');
    expect(issue?.area).toBe('engine');
  });

  it('resolves a relative story file against ENGINE_CWD', () => {
    const issues = validateStartupConfig(processConfig({ STORY_FILE: 'cellar.z5', ENGINE_CWD: scratch }));
    expect(issues).toEqual([]);
  });

  it('errors when the transcript directory cannot be created', () => {
    const blocker = path.join(scratch, 'not-a-dir');
    fs.writeFileSync(blocker, '');

    const issues = validateStartupConfig({ ...baseConfig, TRANSCRIPT_FILE: path.join(blocker, 'session.txt') });

    expect(issues.map((entry) => entry.code)).toEqual(['transcript_dir_not_writable']);
  });

  it('warns when voice does not outrank the keyboard', () => {
    const issues = validateStartupConfig({ ...baseConfig, PRIORITY_KEYBOARD: 2, PRIORITY_VOICE: 2 });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ severity: 'warn', area: 'input', code: 'voice_priority_not_above_keyboard' });
  });

  it('warns when the shutdown timeout is shorter than the idle window', () => {
    const issues = validateStartupConfig({ ...baseConfig, SHUTDOWN_TIMEOUT_MS: 100, ENGINE_IDLE_MS: 500 });

    expect(issues.map((entry) => entry.code)).toEqual(['shutdown_timeout_below_idle_window']);
  });

  it('fails fast when startup validation includes errors', () => {
    let thrown: unknown;
    try {
      validateStartupConfigOrThrow(processConfig({ STORY_FILE: '' }));
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(StartupValidationError);
    if (!(thrown instanceof StartupValidationError)) return;
    expect(thrown.errorCount).toBe(1);
    expect(thrown.issues.map((entry) => entry.code)).toEqual(['missing_story_file']);
  });

  it('returns warnings without throwing', () => {
    const issues = validateStartupConfigOrThrow({ ...baseConfig, PRIORITY_VOICE: 0 });
    expect(issues.map((entry) => entry.severity)).toEqual(['warn']);
  });

  it('finds commands by absolute path or on PATH', () => {
    expect(commandExists(process.execPath)).toBe(true);
    expect(commandExists(path.join(scratch, 'nope'))).toBe(false);
    expect(commandExists('')).toBe(false);
  });
});
