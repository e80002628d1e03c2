import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { loadConfig } from '../../lib/config';
import { createContext } from '../../lib/context';
import { sanitizeResourceName } from '../../lib/sanitization';
import { exitWithError } from '../output';

interface LocationOptions {
  project?: string;
  zone?: string;
}

export function registerInstanceCommands(program: Command) {
  const instancesCmd = program
    .command('instances')
    .description('Inspect and remove instances in the configured zone');

  // example: npx tsx src/cli/index.ts instances list --zone us-east1-c
  instancesCmd
    .command('list')
    .description('List instances in the zone')
    .option('-p, --project <project>', 'Project (default: GCP_PROJECT)')
    .option('-z, --zone <zone>', 'Zone (default: GCP_ZONE)')
    .action(async (options: LocationOptions) => {
      try {
        const config = loadConfig(process.env, options);
        const { compute } = createContext(config);

        const instances = await compute.listInstances(
          config.project,
          config.zone
        );

        if (!instances) {
          console.log(chalk.yellow('No instances found'));
          return;
        }

        const table = new Table({
          head: ['Name', 'Status', 'External IP'],
          colWidths: [40, 14, 18],
        });

        for (const instance of instances) {
          table.push([
            instance.name,
            instance.status === 'RUNNING'
              ? chalk.green(instance.status)
              : (instance.status ?? '-'),
            instance.externalIp ?? '-',
          ]);
        }

        console.log(table.toString());
        console.log(
          chalk.dim(`${instances.length} of at most ${config.maxInstances} instances`)
        );
      } catch (error) {
        exitWithError(error);
      }
    });

  // example: npx tsx src/cli/index.ts instances delete analysis-1700000000
  instancesCmd
    .command('delete <name>')
    .description('Delete an instance and wait until it is gone')
    .option('-p, --project <project>', 'Project (default: GCP_PROJECT)')
    .option('-z, --zone <zone>', 'Zone (default: GCP_ZONE)')
    .action(async (name: string, options: LocationOptions) => {
      try {
        const instanceName = sanitizeResourceName(name, 'Instance name');
        const config = loadConfig(process.env, options);
        const { compute, poller } = createContext(config);

        const operation = await compute.deleteInstance(
          config.project,
          config.zone,
          instanceName
        );

        if (!operation) {
          console.log(chalk.yellow(`Instance ${instanceName} does not exist`));
          return;
        }

        await poller.waitFor(operation);
        console.log(chalk.green(`✓ Instance ${instanceName} deleted`));
      } catch (error) {
        exitWithError(error);
      }
    });
}
