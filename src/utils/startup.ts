import fs from 'node:fs';
import path from 'node:path';
import { execFileSync } from 'node:child_process';
import type { AppConfig } from '../config.js';
import { errorMessage } from '../bridge/errors.js';
import { resolvePath } from './path.js';

export interface StartupIssue {
  severity: 'warn' | 'error';
  area: string;
  message: string;
  remediation?: string;
  code?: string;
}

export class StartupValidationError extends Error {
  readonly issues: StartupIssue[];

  constructor(issues: StartupIssue[]) {
    const errors = issues.filter((entry) => entry.severity === 'error');
    super(`startup validation failed with ${errors.length} error(s)`);
    this.name = 'StartupValidationError';
    this.issues = issues;
  }

  get errorCount() {
    return this.issues.filter((entry) => entry.severity === 'error').length;
  }
}

const ensureDirWritable = (targetPath: string): string | null => {
  try {
    fs.mkdirSync(targetPath, { recursive: true });
    fs.accessSync(targetPath, fs.constants.F_OK | fs.constants.R_OK | fs.constants.W_OK);
    return null;
  } catch (error) {
    return errorMessage(error);
  }
};

export const commandExists = (command: string): boolean => {
  if (!command.trim()) {
    return false;
  }

  if (command.includes('/')) {
    try {
      fs.accessSync(command, fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  try {
    execFileSync('sh', ['-lc', `command -v ${JSON.stringify(command)}`], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
};

const issue = (entry: StartupIssue): StartupIssue => entry;

export const formatStartupIssue = (input: StartupIssue) => {
  if (!input.remediation) {
    return input.message;
  }
  return `${input.message} Remediation: ${input.remediation}`;
};

export const validateStartupConfig = (config: AppConfig): StartupIssue[] => {
  const issues: StartupIssue[] = [];
  const engineDir = resolvePath(config.ENGINE_CWD) || process.cwd();

  if (config.ENGINE_MODE === 'process') {
    if (!config.ENGINE_COMMAND.trim()) {
      issues.push(
        issue({
          severity: 'error',
          area: 'engine',
          message: 'ENGINE_MODE=process requires ENGINE_COMMAND to be set.',
          remediation: 'Set ENGINE_COMMAND to an installed interpreter (for example: dfrotz) or switch ENGINE_MODE=demo.',
          code: 'missing_engine_command',
        }),
      );
    } else if (!commandExists(config.ENGINE_COMMAND)) {
      issues.push(
        issue({
          severity: 'error',
          area: 'engine',
          message: `ENGINE_COMMAND "${config.ENGINE_COMMAND}" is not executable or not on PATH.`,
          remediation: 'Install the interpreter, use an absolute ENGINE_COMMAND path, or switch ENGINE_MODE=demo.',
          code: 'engine_command_not_found',
        }),
      );
    }

    const storyFile = resolvePath(config.STORY_FILE, engineDir);
    if (!storyFile) {
      issues.push(
        issue({
          severity: 'error',
          area: 'engine',
          message: 'ENGINE_MODE=process requires STORY_FILE to be set.',
          remediation: 'Set STORY_FILE (or pass --story) to the story file the interpreter should load.',
          code: 'missing_story_file',
        }),
      );
    } else if (!fs.existsSync(storyFile)) {
      issues.push(
        issue({
          severity: 'error',
          area: 'engine',
          message: `STORY_FILE does not exist: ${storyFile}`,
          remediation: 'Check the path; relative paths are resolved against ENGINE_CWD when it is set.',
          code: 'story_file_not_found',
        }),
      );
    }
  }

  const transcriptFile = resolvePath(config.TRANSCRIPT_FILE);
  if (transcriptFile) {
    const transcriptDir = path.dirname(transcriptFile);
    const transcriptDirErr = ensureDirWritable(transcriptDir);
    if (transcriptDirErr) {
      issues.push(
        issue({
          severity: 'error',
          area: 'transcript',
          message: `TRANSCRIPT_FILE directory is not writable (${transcriptDir}): ${transcriptDirErr}`,
          remediation: `Create the directory with mkdir -p "${transcriptDir}", or point TRANSCRIPT_FILE somewhere writable.`,
          code: 'transcript_dir_not_writable',
        }),
      );
    }
  }

  if (config.PRIORITY_VOICE <= config.PRIORITY_KEYBOARD) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'input',
        message: `PRIORITY_VOICE (${config.PRIORITY_VOICE}) is not above PRIORITY_KEYBOARD (${config.PRIORITY_KEYBOARD}); spoken commands will not jump typed ones.`,
        remediation: 'Raise PRIORITY_VOICE if voice input should be served first.',
        code: 'voice_priority_not_above_keyboard',
      }),
    );
  }

  if (config.SHUTDOWN_TIMEOUT_MS < config.ENGINE_IDLE_MS) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'lifecycle',
        message: `SHUTDOWN_TIMEOUT_MS (${config.SHUTDOWN_TIMEOUT_MS}) is shorter than ENGINE_IDLE_MS (${config.ENGINE_IDLE_MS}); graceful quit will usually be forced.`,
        remediation: 'Set SHUTDOWN_TIMEOUT_MS to a few multiples of ENGINE_IDLE_MS.',
        code: 'shutdown_timeout_below_idle_window',
      }),
    );
  }

  return issues;
};

export const validateStartupConfigOrThrow = (config: AppConfig): StartupIssue[] => {
  const issues = validateStartupConfig(config);
  if (issues.some((entry) => entry.severity === 'error')) {
    throw new StartupValidationError(issues);
  }
  return issues;
};
