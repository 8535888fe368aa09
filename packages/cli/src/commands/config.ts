import type { Command } from 'commander';
import { jsonSchemas, resolveParticipantTiming } from '@parley/config';
import { ConfigError } from '@parley/utils';

type SchemaName = keyof typeof jsonSchemas;

function isSchemaName(name: string): name is SchemaName {
  return Object.prototype.hasOwnProperty.call(jsonSchemas, name);
}

export function registerConfigCommands(program: Command, env: NodeJS.ProcessEnv): void {
  const config = program.command('config').description('Configuration helpers');

  config
    .command('schema [name]')
    .description(`Print JSON schemas (${Object.keys(jsonSchemas).join(', ')})`)
    .action((name: string | undefined) => {
      if (name === undefined) {
        console.log(JSON.stringify(jsonSchemas, null, 2));
        return;
      }
      if (!isSchemaName(name)) {
        throw new ConfigError(`unknown schema "${name}"`);
      }
      console.log(JSON.stringify(jsonSchemas[name], null, 2));
    });

  config
    .command('timing')
    .description('Print participant timing after PARLEY_* overrides')
    .action(() => {
      console.log(JSON.stringify(resolveParticipantTiming({}, env), null, 2));
    });
}
