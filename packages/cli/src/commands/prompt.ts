import type { Command } from 'commander';
import { PromptConfigStore, getPromptConfigPath } from '@parley/config';

export function registerPromptCommands(program: Command, env: NodeJS.ProcessEnv): void {
  const prompt = program.command('prompt').description('The prompt injected into each agent turn');
  const store = (): PromptConfigStore => new PromptConfigStore({ filePath: getPromptConfigPath(env) });

  prompt
    .command('show')
    .description('Print the prompt template and pass keyword')
    .action(() => {
      const { promptTemplate, passKeyword } = store().config;
      console.log(promptTemplate);
      console.log('');
      console.log(`Pass keyword: ${passKeyword}`);
    });

  prompt
    .command('path')
    .description('Print the prompt configuration file path')
    .action(() => {
      console.log(getPromptConfigPath(env));
    });

  prompt
    .command('reset')
    .description('Restore the default prompt template and pass keyword')
    .action(() => {
      const target = store();
      target.resetToDefaults();
      console.log(`Prompt configuration reset: ${target.filePath}`);
    });
}
