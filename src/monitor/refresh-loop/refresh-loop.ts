/**
 * Refresh Loop
 *
 * Drives the dashboard: sample, record history, render, then wait out the
 * rest of the interval measured from the start of the tick so processing
 * time does not accumulate as drift.
 *
 * Stopping is cooperative. `stop()` wakes a pending wait immediately, but a
 * tick that is already sampling runs to completion first, so history is
 * never left half-updated.
 */

import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { TerminalRenderFailure, toErrorMessage } from '../errors.js';
import { HistoryStore } from '../history/history-store.js';
import { renderFrame, type Frame, type RenderOptions } from '../renderer/renderer.js';
import { buildSnapshot, recordTemperatures } from '../snapshot-builder.js';
import { collectSamples, type DashboardSources, type TickSamples } from '../sources.js';
import type { TerminalWriter } from '../renderer/terminal-writer.js';
import type { DashboardConfig, DashboardSnapshot } from '../types/index.js';

export type LoopState = 'running' | 'stopped';

export type FrameRenderer = (snapshot: DashboardSnapshot, config: DashboardConfig, options: RenderOptions) => Frame;

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface RefreshLoopOptions {
  config: DashboardConfig;
  sources: DashboardSources;
  writer: TerminalWriter;
  /** Defaults to a store sized by config.maxHistoryPoints */
  history?: HistoryStore;
  /** Stop by itself after this many ticks */
  maxTicks?: number;
  render?: FrameRenderer;
  now?: () => number;
  sleep?: Sleep;
}

export interface TickEvent {
  snapshot: DashboardSnapshot;
  durationMs: number;
}

export interface SamplerFailureEvent {
  tick: number;
  source: keyof TickSamples;
  failure: string;
  message: string;
}

const SAMPLE_KEYS: ReadonlyArray<keyof TickSamples> = ['cpuUsage', 'cpuTemperature', 'memory', 'disks', 'gpu', 'network'];

const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

/**
 * Remaining wait for a tick that took `elapsedMs` of an `intervalMs` cadence
 */
export function computeWait(intervalMs: number, elapsedMs: number): number {
  return Math.max(0, intervalMs - elapsedMs);
}

export class RefreshLoop extends EventEmitter {
  private readonly logger = createSubsystemLogger('monitor/refresh-loop');
  private readonly config: DashboardConfig;
  private readonly sources: DashboardSources;
  private readonly writer: TerminalWriter;
  private readonly history: HistoryStore;
  private readonly maxTicks?: number;
  private readonly render: FrameRenderer;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private readonly abort = new AbortController();
  private state: LoopState = 'running';
  private started = false;
  private ticks = 0;

  constructor(options: RefreshLoopOptions) {
    super();
    this.config = options.config;
    this.sources = options.sources;
    this.writer = options.writer;
    this.history = options.history ?? new HistoryStore(options.config.maxHistoryPoints);
    this.maxTicks = options.maxTicks;
    this.render = options.render ?? renderFrame;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
  }

  getState(): LoopState {
    return this.state;
  }

  getTickCount(): number {
    return this.ticks;
  }

  getHistory(): HistoryStore {
    return this.history;
  }

  /**
   * Runs ticks until stopped. Resolves on a clean stop and rejects only
   * when the terminal can no longer be drawn to.
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new Error('Refresh loop already started');
    }
    this.started = true;

    if (this.state === 'stopped') {
      return;
    }

    const intervalMs = this.config.refreshRate * 1000;
    this.logger.info('Refresh loop started', { intervalMs, maxHistoryPoints: this.history.capacity });

    try {
      this.writer.enter();
      while (this.state === 'running') {
        const tickStart = this.now();
        await this.runTick();

        if (this.maxTicks !== undefined && this.ticks >= this.maxTicks) {
          this.stop();
        }
        if (this.state !== 'running') {
          break;
        }

        await this.sleep(computeWait(intervalMs, this.now() - tickStart), this.abort.signal);
      }
    } finally {
      this.state = 'stopped';
      this.writer.leave();
      this.logger.info('Refresh loop stopped', { ticks: this.ticks });
      this.emit('stopped', { ticks: this.ticks });
    }
  }

  /**
   * Requests a stop. Takes effect at the next tick boundary.
   */
  stop(): void {
    if (this.state === 'stopped') {
      return;
    }
    this.state = 'stopped';
    this.abort.abort();
  }

  /**
   * One sample, record, render cycle
   */
  async runTick(): Promise<DashboardSnapshot> {
    const tickStart = this.now();
    const tick = this.ticks + 1;
    const timestamp = new Date(tickStart);

    const samples = await collectSamples(this.sources);
    this.reportFailures(tick, samples);

    const temperatures = recordTemperatures(this.history, samples, timestamp);
    const snapshot = buildSnapshot(tick, timestamp, samples, temperatures, this.history, this.config);
    this.ticks = tick;

    let frame: Frame;
    try {
      frame = this.render(snapshot, this.config, { width: this.writer.columns() });
    } catch (error) {
      throw new TerminalRenderFailure(`frame could not be rendered: ${toErrorMessage(error)}`, error);
    }
    this.writer.draw(frame);

    const durationMs = this.now() - tickStart;
    this.logger.debug('Tick complete', { tick, durationMs });
    this.emit('tick', { snapshot, durationMs } satisfies TickEvent);

    return snapshot;
  }

  private reportFailures(tick: number, samples: TickSamples): void {
    for (const source of SAMPLE_KEYS) {
      const result = samples[source];
      if (result && !result.ok) {
        const event: SamplerFailureEvent = {
          tick,
          source,
          failure: result.failure,
          message: result.message,
        };
        this.emit('samplerFailure', event);
      }
    }
  }
}
