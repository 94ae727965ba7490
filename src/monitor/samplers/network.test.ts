import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { NetworkSampler, parseNetDev } from './network.js';
import { ParseError } from '../errors.js';

const NET_DEV = [
  'Inter-|   Receive                                                |  Transmit',
  ' face |bytes    packets errs drop fifo frame compressed multicast|bytes    packets errs drop fifo colls carrier compressed',
  '    lo: 1000      10    0    0    0     0          0         0     1000      10    0    0    0     0       0          0',
  '  eth0: 5000      50    0    0    0     0          0         0     3000      30    0    0    0     0       0          0',
  ' wlan0: 200        2    0    0    0     0          0         0      100       1    0    0    0     0       0          0',
  '',
].join('\n');

describe('parseNetDev', () => {
  it('should total bytes across non-loopback interfaces', () => {
    expect(parseNetDev(NET_DEV)).toEqual({ bytesRecv: 5200, bytesSent: 3100, interfaces: 2 });
  });

  it('should reject content with only loopback', () => {
    const loopbackOnly = NET_DEV.split('\n').slice(0, 3).join('\n');
    expect(() => parseNetDev(loopbackOnly)).toThrow(ParseError);
  });
});

describe('NetworkSampler', () => {
  it('should report unavailable when the counters file is missing', async () => {
    const sampler = new NetworkSampler(join(tmpdir(), 'sysdash-no-such-net-dev'));

    const result = await sampler.sample();

    expect(result.ok === false && result.failure).toBe('unavailable');
  });
});
