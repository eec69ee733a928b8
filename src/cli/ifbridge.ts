#!/usr/bin/env node
import { config } from '../config.js';
import { errorMessage } from '../bridge/errors.js';
import { applyCliOverrides, runSession, type SessionMode } from '../runtime/session.js';
import { createLogger } from '../utils/logger.js';
import {
  formatStartupIssue,
  StartupValidationError,
  type StartupIssue,
  validateStartupConfigOrThrow,
} from '../utils/startup.js';

const logger = createLogger('ifbridge', config.LOG_LEVEL);

class CliError extends Error {
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'CliError';
    this.hint = hint;
  }
}

const fail = (message: string, hint?: string): never => {
  throw new CliError(message, hint);
};

const parseArgs = (argv: string[]) => {
  const args = argv.slice(2);
  const command = args[0] || 'help';
  return { command, args: args.slice(1) };
};

const getFlag = (args: string[], name: string, fallback = '') => {
  const prefixed = `--${name}=`;
  const direct = args.find((arg) => arg.startsWith(prefixed));
  if (direct) return direct.slice(prefixed.length);

  const index = args.findIndex((arg) => arg === `--${name}`);
  if (index >= 0 && args[index + 1]) {
    return args[index + 1];
  }

  return fallback;
};

const hasFlag = (args: string[], name: string) => args.includes(name);

const VALUE_FLAGS = new Set(['--story', '--transcript']);

const positionals = (args: string[]) =>
  args.filter((arg, index) => !arg.startsWith('--') && !VALUE_FLAGS.has(args[index - 1] ?? ''));

const printHelp = () => {
  process.stdout.write(`ifbridge - interactive fiction front-end

Usage:
  ifbridge play [--story <file>] [--transcript <file>]
  ifbridge script <walkthrough> [--story <file>] [--transcript <file>]
  ifbridge help

In play mode, lines starting with ':' are handled by the front-end:
  :status   show engine status
  :undo     undo the last turn
  :cancel   drop commands that have not reached the engine yet
  :quit     leave the session

--story runs ENGINE_COMMAND against the given story file instead of the built-in demo.
Settings are read from the environment and from .env (IFBRIDGE_ENV_FILE overrides the path).
`);
};

const reportStartupIssues = (issues: StartupIssue[]) => {
  for (const issue of issues) {
    const rendered = formatStartupIssue(issue);
    if (issue.severity === 'error') {
      logger.error(`[startup/${issue.area}] ${rendered}`);
    } else {
      logger.warn(`[startup/${issue.area}] ${rendered}`);
    }
  }
};

const run = async (): Promise<number> => {
  const { command, args } = parseArgs(process.argv);

  if (command === 'help' || hasFlag(args, '--help')) {
    printHelp();
    return 0;
  }

  let mode: SessionMode;
  if (command === 'play') {
    mode = { kind: 'play' };
  } else if (command === 'script') {
    const walkthrough = positionals(args)[0] ?? fail('missing walkthrough file', 'Usage: ifbridge script <walkthrough>');
    mode = { kind: 'script', walkthrough };
  } else {
    return fail(`unknown command: ${command}`, 'Run `ifbridge help` for usage.');
  }

  const effective = applyCliOverrides(config, {
    story: getFlag(args, 'story'),
    transcript: getFlag(args, 'transcript'),
  });

  let startupIssues: StartupIssue[];
  try {
    startupIssues = validateStartupConfigOrThrow(effective);
  } catch (error) {
    if (error instanceof StartupValidationError) {
      reportStartupIssues(error.issues);
    }
    throw error;
  }
  reportStartupIssues(startupIssues);

  const outcome = await runSession({ config: effective, mode, logger, handleSignals: true });
  if (outcome.shutdown.mode === 'forced') {
    logger.warn('session was stopped forcibly');
  }
  if (outcome.exit?.reason === 'fatal') {
    logger.error(`engine stopped with a fatal error: ${outcome.exit.error ?? 'unknown'}`);
    return 1;
  }
  return 0;
};

run()
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    if (err instanceof StartupValidationError) {
      logger.error(`startup checks failed, aborting (${err.errorCount} error(s))`);
    } else if (err instanceof CliError) {
      process.stderr.write(`error: ${err.message}\n`);
      if (err.hint) process.stderr.write(`hint: ${err.hint}\n`);
    } else {
      logger.error('fatal', errorMessage(err));
    }
    process.exit(1);
  });
