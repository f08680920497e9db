import { execStreaming } from '../lib/process.js';
import type { CommandExecutor } from './types.js';

/**
 * Runs each action as a real child process (no shell), streaming its output.
 */
export const execaExecutor: CommandExecutor = (action, { cwd, onOutput }) =>
  execStreaming(action.file, action.args, onOutput, { cwd });
