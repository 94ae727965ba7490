/**
 * MetricSource
 *
 * Common contract for every sampler. `sample()` never rejects: anything the
 * underlying read throws is converted into a tagged failure so a single bad
 * metric cannot stop the refresh loop.
 */

import { createSubsystemLogger, type SubsystemLogger } from '../../logging/subsystem.js';
import { failureTagFor, toErrorMessage } from '../errors.js';
import type { FailureTag } from '../types/index.js';

export type SampleResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: FailureTag; message: string };

export interface MetricSource<T> {
  readonly name: string;
  sample(): Promise<SampleResult<T>>;
}

export abstract class BaseMetricSource<T> implements MetricSource<T> {
  protected readonly logger: SubsystemLogger;
  private failing = false;

  constructor(readonly name: string) {
    this.logger = createSubsystemLogger(`monitor/samplers/${name}`);
  }

  protected abstract read(): Promise<T>;

  async sample(): Promise<SampleResult<T>> {
    try {
      const value = await this.read();
      if (this.failing) {
        this.failing = false;
        this.logger.info('Metric source recovered', { source: this.name });
      }
      return { ok: true, value };
    } catch (error) {
      const failure = failureTagFor(error);
      const message = toErrorMessage(error);

      // Warn once per outage; repeats every tick would flood the log.
      if (!this.failing) {
        this.failing = true;
        this.logger.warn('Metric source unavailable', { source: this.name, failure, error: message });
      } else {
        this.logger.debug('Metric source still unavailable', { source: this.name, failure });
      }

      return { ok: false, failure, message };
    }
  }
}
