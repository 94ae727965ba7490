/**
 * Dashboard Runner
 *
 * Wires sources, history and a terminal writer into a refresh loop, and
 * turns SIGINT/SIGTERM (or a quit key) into a clean stop.
 */

import { createSubsystemLogger } from '../logging/subsystem.js';
import { TerminalRenderFailure, toErrorMessage } from './errors.js';
import { HistoryStore } from './history/history-store.js';
import { RefreshLoop, type SamplerFailureEvent } from './refresh-loop/refresh-loop.js';
import { createDefaultSources, type DashboardSources } from './sources.js';
import type { CommandRunner } from './samplers/command-runner.js';
import type { TerminalWriter } from './renderer/terminal-writer.js';
import type { DashboardConfig } from './types/index.js';

const log = createSubsystemLogger('monitor/dashboard');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
  removeListener(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface RunDashboardOptions {
  config: DashboardConfig;
  writer: TerminalWriter;
  sources?: DashboardSources;
  runCommand?: CommandRunner;
  maxTicks?: number;
  signals?: SignalSource;
}

const STOP_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Runs until interrupted (or `maxTicks`). Resolves with the process exit
 * code: 0 after a clean stop, 1 when the terminal could not be used.
 */
export async function runDashboard(options: RunDashboardOptions): Promise<number> {
  const { config, writer } = options;
  const signals = options.signals ?? process;

  const loop = new RefreshLoop({
    config,
    writer,
    sources: options.sources ?? createDefaultSources(config, options.runCommand),
    history: new HistoryStore(config.maxHistoryPoints),
    maxTicks: options.maxTicks,
  });

  loop.on('samplerFailure', (event: SamplerFailureEvent) => {
    log.debug('Sampler failure', { ...event });
  });

  const onSignal = () => {
    log.info('Stop requested');
    loop.stop();
  };
  for (const signal of STOP_SIGNALS) {
    signals.once(signal, onSignal);
  }
  // The screen reads the keyboard raw, so Ctrl+C arrives as a key
  writer.onQuit?.(onSignal);

  try {
    await loop.start();
    return EXIT_OK;
  } catch (error) {
    if (error instanceof TerminalRenderFailure) {
      log.error('Dashboard cannot draw to the terminal', { error: error.message });
      return EXIT_FAILURE;
    }
    log.fatal('Dashboard crashed', { error: toErrorMessage(error) });
    throw error;
  } finally {
    for (const signal of STOP_SIGNALS) {
      signals.removeListener(signal, onSignal);
    }
  }
}
