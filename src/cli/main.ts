/**
 * Command line handling: flags, config overrides and the choice of writer.
 */

import { Command } from 'commander';
import {
  getLogOutputFailure,
  parseLevel,
  setLogLevel,
  setLogOutput,
  type LogOutput,
} from '../logging/subsystem.js';
import {
  applyConfigOverrides,
  defaultConfigPath,
  loadDashboardConfig,
  saveDashboardConfig,
  type RawDashboardConfig,
} from '../monitor/config/config-loader.js';
import { runDashboard, EXIT_FAILURE, EXIT_OK } from '../monitor/dashboard.js';
import { BlessedTerminalWriter, PlainTerminalWriter } from '../monitor/renderer/terminal-writer.js';
import { toErrorMessage } from '../monitor/errors.js';

export interface CliOptions {
  config: string;
  refreshRate?: number;
  history?: number;
  gpu: boolean;
  network?: boolean;
  once?: boolean;
  initConfig?: boolean;
  logFile?: string;
  logLevel?: string;
}

export function buildProgram(): Command {
  return new Command()
    .name('sysdash')
    .description('Live terminal dashboard for CPU/GPU temperatures, utilization, memory and disks')
    .option('-c, --config <path>', 'config file', defaultConfigPath())
    .option('-r, --refresh-rate <seconds>', 'seconds between refreshes', value => Number(value))
    .option('-n, --history <points>', 'temperature samples kept per graph', value => Number(value))
    .option('--no-gpu', 'hide the GPU panel and skip GPU sampling')
    .option('--network', 'show network counters')
    .option('--once', 'print a single frame to stdout and exit')
    .option('--init-config', 'write the effective configuration to the config path and exit')
    .option('--log-file <path>', 'append log records to this file')
    .option('--log-level <level>', 'debug, info, warn, error or fatal');
}

/**
 * Maps CLI flags onto the config file shape so they go through the same
 * validation as the file.
 */
export function overridesFromOptions(options: CliOptions): RawDashboardConfig {
  const overrides: RawDashboardConfig = {};
  if (options.refreshRate !== undefined) overrides.refresh_rate = options.refreshRate;
  if (options.history !== undefined) overrides.max_history_points = options.history;

  const display: NonNullable<RawDashboardConfig['display']> = {};
  if (!options.gpu) display.show_gpu = false;
  if (options.network) display.show_network = true;
  if (Object.keys(display).length > 0) overrides.display = display;

  return overrides;
}

function reportLogFailure(): boolean {
  const failure = getLogOutputFailure();
  if (failure) {
    process.stderr.write(`Warning: logging was turned off after a failed write to ${failure}\n`);
  }
  return failure !== undefined;
}

export async function main(argv: readonly string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse([...argv]);
  const options = program.opts<CliOptions>();

  if (options.logLevel) {
    const level = parseLevel(options.logLevel);
    if (level) {
      setLogLevel(level);
    } else {
      process.stderr.write(`Ignoring unknown log level "${options.logLevel}"\n`);
    }
  }

  const fileOutput: LogOutput | undefined = options.logFile ? { kind: 'file', path: options.logFile } : undefined;
  if (fileOutput) {
    setLogOutput(fileOutput);
  }

  const loaded = loadDashboardConfig(options.config);
  const { config, warnings } = applyConfigOverrides(loaded.config, overridesFromOptions(options));

  for (const warning of [...loaded.warnings, ...warnings]) {
    process.stderr.write(`Warning: ${warning}\n`);
  }

  if (options.initConfig) {
    try {
      saveDashboardConfig(options.config, config);
    } catch (error) {
      process.stderr.write(`Could not write ${options.config}: ${toErrorMessage(error)}\n`);
      return EXIT_FAILURE;
    }
    process.stdout.write(`Wrote ${options.config}\n`);
    return EXIT_OK;
  }

  if (options.once) {
    const exitCode = await runDashboard({ config, writer: new PlainTerminalWriter(process.stdout), maxTicks: 1 });
    reportLogFailure();
    return exitCode;
  }

  if (!process.stdout.isTTY) {
    process.stderr.write('Error: sysdash needs an interactive terminal (use --once for plain output)\n');
    return EXIT_FAILURE;
  }

  // Log records would tear the frame while the screen is owned
  setLogOutput(fileOutput ?? { kind: 'discard' });
  const exitCode = await runDashboard({ config, writer: new BlessedTerminalWriter(process.stdout) });
  const logFailed = reportLogFailure();
  setLogOutput(fileOutput && !logFailed ? fileOutput : { kind: 'stderr' });

  if (exitCode === EXIT_OK) {
    process.stdout.write('Dashboard stopped.\n');
  } else {
    process.stderr.write('Error: the terminal could not be drawn to\n');
  }
  return exitCode;
}
