#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerFireCommand } from './commands/fire';
import { registerInstanceCommands } from './commands/instances';
import { registerSSHCommands } from './commands/ssh';
import { exitWithError } from './output';

const program = new Command();

program
  .name('flint')
  .description(
    'Fire one-off jobs on ephemeral Compute Engine instances over SSH'
  );

registerFireCommand(program);
registerInstanceCommands(program);
registerSSHCommands(program);

program.parseAsync().catch(exitWithError);
