import { Command } from 'commander';
import {
  CHECK_MODES,
  CONFIGURATION_ERROR_EXIT_CODE,
  ConfigurationError,
  DEFAULT_COMMUNITY,
  DEFAULT_SNMP_PORT,
  DEFAULT_SNMP_VERSION,
  DEFAULT_TIMEOUT,
  EXIT_CODES,
  createLogger,
  getLogger,
  parseNumeric,
  setDefaultLogger,
} from '@srxprobe/shared';
import type { CheckMode } from '@srxprobe/shared';
import {
  CheckRunner,
  exitCodeFor,
  loadCatalog,
  metricIdForMode,
  parseMode,
  renderOutcome,
  type CollectorFactory,
  type MetricCatalog,
} from '@srxprobe/core';

export interface CheckOptions {
  host?: string;
  community: string;
  mode?: string;
  interface?: string;
  port: string;
  timeout: string;
  snmpVersion: string;
  warning?: string;
  critical?: string;
  catalog?: string;
  verbose?: boolean;
}

/** What the command writes and how it exits. */
export interface CheckReport {
  exitCode: number;
  stdout?: string;
  stderr?: string;
}

function parseThreshold(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseNumeric(value);
  if (parsed === undefined || parsed < 0) {
    throw new ConfigurationError([`${name} threshold must be a non-negative number: "${value}"`]);
  }
  return parsed;
}

export function applyThresholdOverrides(
  catalog: MetricCatalog,
  mode: CheckMode,
  options: Pick<CheckOptions, 'warning' | 'critical'>,
): MetricCatalog {
  const warning = parseThreshold('warning', options.warning);
  const critical = parseThreshold('critical', options.critical);
  if (warning === undefined && critical === undefined) return catalog;

  const metric = catalog.get(metricIdForMode(mode));
  if (metric.warningThreshold === 0 && metric.criticalThreshold === 0) {
    throw new ConfigurationError([`mode ${mode} does not take thresholds`]);
  }
  return catalog.withThresholds(metric.id, { warning, critical });
}

export async function runCheck(
  options: CheckOptions,
  collectorFactory?: CollectorFactory,
): Promise<CheckReport> {
  try {
    const mode = parseMode(options.mode ?? '');
    const catalog = applyThresholdOverrides(loadCatalog(options.catalog), mode, options);
    const runner = new CheckRunner({ catalog, collectorFactory, logger: getLogger() });

    const outcome = await runner.run({
      target: options.host ?? '',
      community: options.community,
      mode,
      interfaceName: options.interface,
      port: options.port,
      timeout: options.timeout,
      version: options.snmpVersion,
    });
    return { exitCode: exitCodeFor(outcome.status), stdout: renderOutcome(outcome) };
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return {
        exitCode: CONFIGURATION_ERROR_EXIT_CODE,
        stderr: `CONFIGURATION ERROR - ${err.errors.join('; ')}`,
      };
    }
    getLogger().error({ err }, 'Check failed unexpectedly');
    const msg = err instanceof Error ? err.message : String(err);
    return { exitCode: EXIT_CODES.UNKNOWN, stdout: `UNKNOWN - unexpected failure: ${msg}` };
  }
}

export const checkCommand = new Command('check')
  .description('Poll the appliance and report one health metric')
  .option('-H, --host <address>', 'Appliance hostname or address')
  .option('-C, --community <string>', 'SNMP community', DEFAULT_COMMUNITY)
  .option('-m, --mode <mode>', `Check mode (${CHECK_MODES.join(', ')})`)
  .option('-i, --interface <name>', 'Interface name for the interface modes')
  .option('-p, --port <number>', 'SNMP port', String(DEFAULT_SNMP_PORT))
  .option('-t, --timeout <duration>', 'Timeout for each SNMP response, e.g. 5s or 1500', DEFAULT_TIMEOUT)
  .option('--snmp-version <version>', 'SNMP version (1 or 2c)', DEFAULT_SNMP_VERSION)
  .option('-w, --warning <number>', 'Override the warning threshold')
  .option('-c, --critical <number>', 'Override the critical threshold')
  .option('--catalog <path>', 'Metric catalog file')
  .option('--verbose', 'Debug logging on stderr')
  .action(async (options: CheckOptions) => {
    if (options.verbose) {
      setDefaultLogger(createLogger({ level: 'debug', pretty: true }));
    }

    const report = await runCheck(options);
    if (report.stderr) console.error(report.stderr);
    if (report.stdout) console.log(report.stdout);
    process.exitCode = report.exitCode;
  });
