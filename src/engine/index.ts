import type { AppConfig } from '../config.js';
import type { Logger } from '../utils/logger.js';
import { createDemoBundle } from './demo.js';
import { createProcessBundle } from './process.js';
import type { InterpreterBundle } from './types.js';

export type InterpreterVisitor<TResult> = <TState>(bundle: InterpreterBundle<TState>) => TResult;

export const withInterpreter = <TResult>(config: AppConfig, visit: InterpreterVisitor<TResult>, logger?: Logger): TResult => {
  if (config.ENGINE_MODE === 'process') {
    return visit(
      createProcessBundle({
        command: config.ENGINE_COMMAND,
        args: config.ENGINE_ARGS,
        storyFile: config.STORY_FILE,
        cwd: config.ENGINE_CWD,
        idleMs: config.ENGINE_IDLE_MS,
        logger: logger?.child('process'),
      }),
    );
  }

  return visit(createDemoBundle());
};
