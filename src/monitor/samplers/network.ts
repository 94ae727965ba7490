/**
 * Network Sampler
 *
 * Total bytes sent and received across non-loopback interfaces, from
 * /proc/net/dev.
 */

import { readFileSync, existsSync } from 'node:fs';
import { BaseMetricSource } from './metric-source.js';
import { ParseError, SensorUnavailableError } from '../errors.js';
import type { NetworkSample } from '../types/index.js';

export const NET_DEV_PATH = '/proc/net/dev';

export function parseNetDev(content: string): NetworkSample {
  let bytesRecv = 0;
  let bytesSent = 0;
  let interfaces = 0;

  // Two header lines, then "iface: rx_bytes rx_packets ... tx_bytes ..."
  for (const line of content.split('\n').slice(2)) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const name = line.slice(0, separator).trim();
    if (name === 'lo') continue;

    const values = line.slice(separator + 1).trim().split(/\s+/).map(Number);
    if (values.length < 9 || values.some(v => isNaN(v))) continue;

    bytesRecv += values[0];
    bytesSent += values[8];
    interfaces++;
  }

  if (interfaces === 0) {
    throw new ParseError(NET_DEV_PATH, 'no network interfaces');
  }

  return { bytesSent, bytesRecv, interfaces };
}

export class NetworkSampler extends BaseMetricSource<NetworkSample> {
  constructor(private readonly netDevPath: string = NET_DEV_PATH) {
    super('network');
  }

  protected async read(): Promise<NetworkSample> {
    if (!existsSync(this.netDevPath)) {
      throw new SensorUnavailableError('network counters', `${this.netDevPath} not found`);
    }
    return parseNetDev(readFileSync(this.netDevPath, 'utf8'));
  }
}
