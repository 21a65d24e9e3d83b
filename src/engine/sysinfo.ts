/**
 * @fileoverview OS information collaborator used by ps, top, df, free and kill.
 *
 * Builtins only see the SystemInfoProvider interface. The default provider reads
 * from the `systeminformation` package and signals processes through
 * `process.kill`; tests hand the engine an in-process fake instead.
 *
 * @module engine/sysinfo
 */

import * as si from 'systeminformation';
import { errnoCode } from './result';

export interface ProcessInfo {
  pid: number;
  name: string;
  /** CPU usage in percent */
  cpu: number;
  /** Memory usage in percent */
  mem: number;
}

/** Byte counts plus derived percentages. */
export interface MemoryInfo {
  total: number;
  available: number;
  used: number;
  free: number;
  percent: number;
  swapTotal: number;
  swapUsed: number;
  swapFree: number;
  swapPercent: number;
}

export interface DiskUsage {
  total: number;
  used: number;
  free: number;
  percent: number;
}

/**
 * Why a partition has no usage figures.
 */
export type DiskUsageFailure = 'permission_denied' | 'unavailable';

/**
 * One mounted partition. `usage` names the failure when the partition could
 * not be measured: `permission_denied` when reading it was refused,
 * `unavailable` when it reports no size (empty or virtual filesystems).
 */
export interface DiskInfo {
  device: string;
  mountpoint: string;
  fsType: string;
  usage: DiskUsage | DiskUsageFailure;
}

/**
 * Why a terminate request failed.
 */
export type TerminateFailure = 'no_such_process' | 'access_denied';

export interface SystemInfoProvider {
  processes(): Promise<ProcessInfo[]>;
  /** Overall CPU load in percent */
  cpuLoad(): Promise<number>;
  memory(): Promise<MemoryInfo>;
  disks(): Promise<DiskInfo[]>;
  /** Send SIGTERM to a process; resolves to null on success. */
  terminate(pid: number): Promise<TerminateFailure | null>;
}

const percentOf = (part: number, total: number): number => (total > 0 ? (part / total) * 100 : 0);

/**
 * SystemInfoProvider backed by the host operating system.
 */
export class HostSystemInfo implements SystemInfoProvider {
  async processes(): Promise<ProcessInfo[]> {
    const data = await si.processes();
    return data.list.map(proc => ({
      pid: proc.pid,
      name: proc.name,
      cpu: Number.isFinite(proc.cpu) ? proc.cpu : 0,
      mem: Number.isFinite(proc.mem) ? proc.mem : 0
    }));
  }

  async cpuLoad(): Promise<number> {
    const load = await si.currentLoad();
    return load.currentLoad;
  }

  async memory(): Promise<MemoryInfo> {
    const mem = await si.mem();
    const used = mem.total - mem.available;
    return {
      total: mem.total,
      available: mem.available,
      used,
      free: mem.free,
      percent: percentOf(used, mem.total),
      swapTotal: mem.swaptotal,
      swapUsed: mem.swapused,
      swapFree: mem.swapfree,
      swapPercent: percentOf(mem.swapused, mem.swaptotal)
    };
  }

  async disks(): Promise<DiskInfo[]> {
    const partitions = await si.fsSize();
    return partitions.map(part => ({
      device: part.fs,
      mountpoint: part.mount,
      fsType: part.type,
      usage: Number.isFinite(part.size) && part.size > 0
        ? {
            total: part.size,
            used: part.used,
            free: part.available,
            percent: part.use
          }
        : 'unavailable'
    }));
  }

  async terminate(pid: number): Promise<TerminateFailure | null> {
    try {
      process.kill(pid, 'SIGTERM');
      return null;
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ESRCH') {
        return 'no_such_process';
      }
      if (code === 'EPERM') {
        return 'access_denied';
      }
      throw error;
    }
  }
}
