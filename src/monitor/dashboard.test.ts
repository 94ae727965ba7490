/**
 * Dashboard Runner Tests
 */

import { describe, it, expect } from 'vitest';
import { EventEmitter } from 'node:events';
import { runDashboard, EXIT_FAILURE, EXIT_OK } from './dashboard.js';
import { BlessedTerminalWriter } from './renderer/terminal-writer.js';
import { fakeWriter, healthySources, testConfig } from './test-setup.js';
import type { MetricSource } from './samplers/metric-source.js';
import type { MemorySample } from './types/index.js';

describe('runDashboard', () => {
  it('should stop cleanly on SIGINT and release the signal handlers', async () => {
    const signals = new EventEmitter();
    const writer = fakeWriter();
    writer.draw.mockImplementation(() => {
      signals.emit('SIGINT');
    });

    const exitCode = await runDashboard({
      config: testConfig({ refreshRate: 0.01 }),
      writer,
      sources: healthySources(),
      signals,
    });

    expect(exitCode).toBe(EXIT_OK);
    expect(writer.draw).toHaveBeenCalledTimes(1);
    expect(writer.leave).toHaveBeenCalledTimes(1);
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });

  it('should stop cleanly on the quit key', async () => {
    const writer = fakeWriter();
    writer.draw.mockImplementation(() => {
      writer.pressQuit();
    });

    const exitCode = await runDashboard({
      config: testConfig({ refreshRate: 0.01 }),
      writer,
      sources: healthySources(),
      signals: new EventEmitter(),
    });

    expect(exitCode).toBe(EXIT_OK);
    expect(writer.draw).toHaveBeenCalledTimes(1);
    expect(writer.leave).toHaveBeenCalledTimes(1);
  });

  it('should stop after maxTicks', async () => {
    const writer = fakeWriter();

    const exitCode = await runDashboard({
      config: testConfig({ refreshRate: 0.01 }),
      writer,
      sources: healthySources(),
      maxTicks: 2,
      signals: new EventEmitter(),
    });

    expect(exitCode).toBe(EXIT_OK);
    expect(writer.draw).toHaveBeenCalledTimes(2);
  });

  it('should exit with failure when output is not a terminal', async () => {
    const exitCode = await runDashboard({
      config: testConfig(),
      writer: new BlessedTerminalWriter({ isTTY: false, write: () => true }),
      sources: healthySources(),
      signals: new EventEmitter(),
    });

    expect(exitCode).toBe(EXIT_FAILURE);
  });

  it('should rethrow unexpected errors', async () => {
    const broken: MetricSource<MemorySample> = {
      name: 'memory',
      sample: () => Promise.reject(new Error('source contract broken')),
    };

    await expect(
      runDashboard({
        config: testConfig(),
        writer: fakeWriter(),
        sources: healthySources({ memory: broken }),
        signals: new EventEmitter(),
      }),
    ).rejects.toThrow('source contract broken');
  });
});
