import { Command } from 'commander';
import chalk from 'chalk';
import { CHECK_MODES, ConfigurationError, INTERFACE_MODES } from '@srxprobe/shared';
import { loadCatalog, metricIdForMode, type MetricCatalog } from '@srxprobe/core';
import { renderModesTable, type ModeRow } from '../ui/Table.js';

export function modeRows(catalog: MetricCatalog): ModeRow[] {
  return CHECK_MODES.map((mode) => ({
    mode,
    metric: catalog.get(metricIdForMode(mode)),
    needsInterface: INTERFACE_MODES.includes(mode),
  }));
}

export const modesCommand = new Command('modes')
  .option('--catalog <path>', 'Metric catalog file')
  .description('List the check modes')
  .action((options: { catalog?: string }) => {
    try {
      console.log(renderModesTable(modeRows(loadCatalog(options.catalog))));
    } catch (err) {
      if (err instanceof ConfigurationError) {
        console.error(chalk.red(`Error: ${err.message}`));
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  });
