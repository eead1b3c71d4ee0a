#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { PROBE_VERSION } from '@srxprobe/shared';
import { checkCommand } from './commands/check.js';
import { modesCommand } from './commands/modes.js';
import { catalogCommand } from './commands/catalog.js';

const program = new Command();

program
  .name('srx-probe')
  .version(PROBE_VERSION, '-v, --version')
  .description(chalk.bold('srx-probe') + ' - health checks for SRX security appliances over SNMP')
  .addCommand(checkCommand, { isDefault: true })
  .addCommand(modesCommand)
  .addCommand(catalogCommand);

await program.parseAsync(process.argv);
