import { Command } from 'commander';
import { registerConfigCommands } from './commands/config.js';
import { registerHistoryCommands } from './commands/history.js';
import { registerPromptCommands } from './commands/prompt.js';

export const VERSION = '0.1.0';

/** Build the command tree. `env` decides where data lives (PARLEY_HOME and friends). */
export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('parley')
    .description('Turn-based group chat between terminal coding agents')
    .version(VERSION);

  registerHistoryCommands(program, env);
  registerPromptCommands(program, env);
  registerConfigCommands(program, env);

  return program;
}
