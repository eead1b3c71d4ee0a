import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigurationError, NotFoundError } from '@srxprobe/shared';
import { loadCatalog } from '@srxprobe/core';
import { renderCatalogTable, renderMetricDetail } from '../ui/Table.js';

interface CatalogOptions {
  json?: boolean;
  catalog?: string;
  informational?: boolean;
}

export const catalogCommand = new Command('catalog')
  .argument('[id]', 'Show a single metric')
  .option('--json', 'Output as JSON')
  .option('--informational', 'List the interface counters instead of the metrics')
  .option('--catalog <path>', 'Metric catalog file')
  .description('Show the metric catalog')
  .action((id: string | undefined, options: CatalogOptions) => {
    try {
      const catalog = loadCatalog(options.catalog);

      if (id) {
        const metric = catalog.get(id);
        console.log(options.json ? JSON.stringify(metric, null, 2) : renderMetricDetail(metric));
        return;
      }

      const metrics = options.informational ? catalog.informational() : catalog.list();
      if (options.json) {
        console.log(JSON.stringify(metrics, null, 2));
        return;
      }
      console.log(renderCatalogTable(metrics));
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof NotFoundError) {
        console.error(chalk.red(`Error: ${err.message}`));
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  });
