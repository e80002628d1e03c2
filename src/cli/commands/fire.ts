import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'readline/promises';
import { Instance, JobSpec } from '../../interfaces';
import { loadConfig } from '../../lib/config';
import { createContext, createOrchestrator } from '../../lib/context';
import { createJobSpec, loadJobFile } from '../../lib/job-loader';
import {
  parseAccelerators,
  parseMetadata,
  sanitizeNumber,
  ValidationError,
} from '../../lib/sanitization';
import { collect, exitWithError } from '../output';

interface FireCommandOptions {
  job?: string;
  name?: string;
  script?: string;
  image?: string;
  imageProject?: string;
  machineType?: string;
  accelerator: string[];
  meta: string[];
  startupScript?: string;
  preemptible: boolean;
  unique?: boolean;
  wait?: boolean;
  retryWait: string;
  maxRetry: string;
  project?: string;
  zone?: string;
}

function jobFromOptions(options: FireCommandOptions): JobSpec {
  const job = options.job
    ? loadJobFile(options.job)
    : createJobSpec({
        name: options.name,
        script: options.script,
        image: options.image,
        imageProject: options.imageProject,
        machineType: options.machineType,
        accelerators: parseAccelerators(options.accelerator),
        preemptible: options.preemptible,
        metadata: parseMetadata(options.meta),
        startupScript: options.startupScript,
      });

  if (!options.unique) return job;

  const suffix = `-${Math.floor(Date.now() / 1000)}`;
  if (job.name.length + suffix.length > 63) {
    throw new ValidationError(
      `Job name ${job.name} is too long to be made unique`
    );
  }
  return { ...job, name: `${job.name}${suffix}` };
}

async function confirmDeletion(instance: Instance): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  try {
    await rl.question(chalk.yellow(`DELETE instance ${instance.name}? [Enter]`));
  } finally {
    rl.close();
  }
}

export function registerFireCommand(program: Command) {
  // example: npx tsx src/cli/index.ts fire --job jobs/analysis.json --retry-wait 10
  program
    .command('fire')
    .description(
      'Run a script on a new instance and delete the instance afterwards'
    )
    .option('-j, --job <file>', 'JSON job definition')
    .option('-n, --name <name>', 'Job and instance name')
    .option('-s, --script <path>', 'Bash script executed on the instance')
    .option('-i, --image <family>', 'Image family of the boot disk')
    .option('--image-project <project>', 'Project owning the image family')
    .option('-m, --machine-type <type>', 'Machine type (default: n1-standard-4)')
    .option(
      '-a, --accelerator <label=count>',
      'Accelerator to attach, repeatable',
      collect,
      []
    )
    .option('--meta <key=value>', 'Instance metadata entry, repeatable', collect, [])
    .option('--startup-script <path>', 'Script run by the instance on boot')
    .option('--no-preemptible', 'Create a standard instance')
    .option('--unique', 'Append a timestamp to the job name')
    .option('-w, --wait', 'Ask for confirmation before deleting the instance')
    .option('--retry-wait <seconds>', 'Seconds between SSH attempts', '5')
    .option('--max-retry <number>', 'Number of SSH attempts', '5')
    .option('-p, --project <project>', 'Project (default: GCP_PROJECT)')
    .option('-z, --zone <zone>', 'Zone (default: GCP_ZONE)')
    .action(async (options: FireCommandOptions) => {
      try {
        const config = loadConfig(process.env, {
          project: options.project,
          zone: options.zone,
        });
        const job = jobFromOptions(options);
        const retryWait = sanitizeNumber(options.retryWait, 'retry wait', 0, 600);
        const maxRetry = sanitizeNumber(options.maxRetry, 'max retry', 1, 100);

        const context = createContext(config);
        const orchestrator = createOrchestrator(context, confirmDeletion);

        console.log(chalk.bold(`🔥 Firing job ${job.name}`));
        const output = await orchestrator.fire(job, {
          waitForConfirmation: options.wait ?? false,
          retryWait,
          maxRetry,
        });

        if (output) {
          process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
        }
        console.log(chalk.green(`✓ Job ${job.name} finished`));
      } catch (error) {
        exitWithError(error);
      }
    });
}
