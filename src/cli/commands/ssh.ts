import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { NodeSshTransport } from '../../classes/ssh-transport';
import { DEFAULT_SSH_USERNAME } from '../../lib/config';
import {
  sanitizeFilePath,
  sanitizeNumber,
  sanitizeSSHHost,
  sanitizeSSHUsername,
  ValidationError,
} from '../../lib/sanitization';
import { exitWithError } from '../output';

interface SSHTestOptions {
  host?: string;
  username?: string;
  port?: string;
  privateKey?: string;
  timeout?: string;
}

export function registerSSHCommands(program: Command) {
  // example: npx tsx src/cli/index.ts ssh-test --host 203.0.113.7 --private-key secrets/job_private.key
  program
    .command('ssh-test')
    .description('Test the SSH connection to an instance')
    .option('-H, --host <host>', 'Instance hostname or IP address')
    .option('-u, --username <username>', 'SSH username')
    .option('--port <port>', 'SSH port (default: 22)')
    .option('--private-key <path>', 'Path to private key file')
    .option(
      '--timeout <timeout>',
      'Connection timeout in milliseconds (default: 20000)'
    )
    .action(async (options: SSHTestOptions) => {
      console.log(chalk.bold('🔐 Testing SSH Connection...'));

      try {
        const host = sanitizeSSHHost(options.host ?? process.env.SSH_HOST ?? '');
        const username = sanitizeSSHUsername(
          options.username ?? process.env.FLINT_SSH_USERNAME ?? DEFAULT_SSH_USERNAME
        );
        const port = sanitizeNumber(options.port ?? '22', 'port', 1, 65535);
        const readyTimeout = sanitizeNumber(
          options.timeout ?? '20000',
          'timeout',
          1000
        );
        const keyPath = sanitizeFilePath(
          options.privateKey ?? process.env.SSH_PRIVATE_KEY ?? '',
          'Private key'
        );

        if (!fs.existsSync(keyPath)) {
          throw new ValidationError(`Private key file not found: ${keyPath}`);
        }

        console.log(chalk.dim(`Connecting to ${username}@${host}:${port}\n`));

        const transport = new NodeSshTransport({ username, port, readyTimeout });
        const result = await transport.probe(host, keyPath);

        if (result.kind === 'probed') {
          console.log(chalk.green('✅ SSH connection test successful!'));
        } else {
          console.log(chalk.red('❌ SSH connection test failed'));
          console.log(chalk.dim(result.stderr));
          process.exit(1);
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
