/**
 * System metrics from Node.js: CPU and RAM through `os`, network throughput
 * from /proc/net/dev counters (Linux only; elsewhere the field is unavailable).
 */

import * as os from 'os';
import { promises as fs } from 'fs';
import { MetricReading } from '../mood/types';
import { MetricSource } from './types';
import { MetricsUnavailableError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('NodeMetricSource');

interface CpuTotals {
  idle: number;
  total: number;
}

interface NetworkCounter {
  bytes: number;
  at: number;
}

export interface NodeMetricSourceOptions {
  cpus?: () => os.CpuInfo[];
  memory?: () => { total: number; free: number };
  readNetDev?: () => Promise<string>;
  clock?: () => number;
}

const sumCpuTimes = (cpus: os.CpuInfo[]): CpuTotals =>
  cpus.reduce(
    (acc, cpu) => {
      const { user, nice, sys, idle, irq } = cpu.times;
      return {
        idle: acc.idle + idle,
        total: acc.total + user + nice + sys + idle + irq,
      };
    },
    { idle: 0, total: 0 }
  );

/**
 * Sum received and transmitted bytes over every interface except loopback
 */
export function parseNetDev(content: string): number {
  let bytes = 0;
  for (const line of content.split('\n').slice(2)) {
    const [iface, counters] = line.split(':');
    if (!counters || iface.trim() === 'lo') {
      continue;
    }
    const fields = counters.trim().split(/\s+/).map(Number);
    const received = fields[0] ?? 0;
    const transmitted = fields[8] ?? 0;
    if (Number.isFinite(received) && Number.isFinite(transmitted)) {
      bytes += received + transmitted;
    }
  }
  return bytes;
}

export class NodeMetricSource implements MetricSource {
  private readonly cpus: () => os.CpuInfo[];
  private readonly memory: () => { total: number; free: number };
  private readonly readNetDev: () => Promise<string>;
  private readonly clock: () => number;

  private lastCpu: CpuTotals | null = null;
  private lastNetwork: NetworkCounter | null = null;

  constructor(options: NodeMetricSourceOptions = {}) {
    this.cpus = options.cpus ?? (() => os.cpus());
    this.memory = options.memory ?? (() => ({ total: os.totalmem(), free: os.freemem() }));
    this.readNetDev = options.readNetDev ?? (() => fs.readFile('/proc/net/dev', 'utf-8'));
    this.clock = options.clock ?? (() => Date.now());
  }

  async sample(): Promise<MetricReading> {
    const [cpuPct, ramPct, netKbps] = await Promise.all([
      this.guard('cpu', async () => this.readCpu()),
      this.guard('ram', async () => this.readRam()),
      this.guard('network', () => this.readNetwork()),
    ]);

    return { cpuPct, ramPct, netKbps, timestamp: this.clock() };
  }

  private async guard(metric: string, read: () => Promise<number>): Promise<number | null> {
    try {
      return await read();
    } catch (error) {
      const unavailable = error instanceof MetricsUnavailableError
        ? error
        : new MetricsUnavailableError(metric, error);
      logger.withFields({ metric }).debug(unavailable.message, unavailable.toJSON());
      return null;
    }
  }

  private readCpu(): number {
    const cpus = this.cpus();
    if (cpus.length === 0) {
      throw new MetricsUnavailableError('cpu');
    }

    const current = sumCpuTimes(cpus);
    const previous = this.lastCpu ?? { idle: 0, total: 0 };
    this.lastCpu = current;

    const total = current.total - previous.total;
    const idle = current.idle - previous.idle;
    if (total <= 0) {
      throw new MetricsUnavailableError('cpu');
    }

    return Math.max(0, Math.min(100, ((total - idle) / total) * 100));
  }

  private readRam(): number {
    const { total, free } = this.memory();
    if (total <= 0) {
      throw new MetricsUnavailableError('ram');
    }
    return ((total - free) / total) * 100;
  }

  private async readNetwork(): Promise<number> {
    let content: string;
    try {
      content = await this.readNetDev();
    } catch (error) {
      throw new MetricsUnavailableError('network', error);
    }

    const current: NetworkCounter = { bytes: parseNetDev(content), at: this.clock() };
    const previous = this.lastNetwork;
    this.lastNetwork = current;

    if (!previous) {
      return 0;
    }

    const elapsedSeconds = (current.at - previous.at) / 1000;
    if (elapsedSeconds <= 0) {
      return 0;
    }

    return Math.max(0, (current.bytes - previous.bytes) / 1024 / elapsedSeconds);
  }
}
