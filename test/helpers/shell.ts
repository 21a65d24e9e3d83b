import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Session, type SessionOptions } from '../../src/engine/session';
import { ShellEngine } from '../../src/engine/shell';
import { ExternalExecutor } from '../../src/engine/executor';
import type { ExecutionContext } from '../../src/engine/types';
import type {
  DiskInfo,
  MemoryInfo,
  ProcessInfo,
  SystemInfoProvider,
  TerminateFailure
} from '../../src/engine/sysinfo';

const GB = 1024 ** 3;

/**
 * Creates a unique temporary directory for one test.
 */
export function createTempDir(): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'natterm-test-')));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * In-process stand-in for the host OS: fixed processes, memory and disks.
 * Records terminate requests; pid 999999 does not exist and pid 1 is protected.
 */
export class FakeSystemInfo implements SystemInfoProvider {
  readonly terminated: number[] = [];

  processList: ProcessInfo[] = [
    { pid: 1, name: 'init', cpu: 0.1, mem: 0.2 },
    { pid: 42, name: 'editor', cpu: 12.5, mem: 3.2 },
    { pid: 77, name: 'compiler', cpu: 55, mem: 10 }
  ];

  memoryInfo: MemoryInfo = {
    total: 8 * GB,
    available: 6 * GB,
    used: 2 * GB,
    free: 5 * GB,
    percent: 25,
    swapTotal: 2 * GB,
    swapUsed: 0.5 * GB,
    swapFree: 1.5 * GB,
    swapPercent: 25
  };

  diskList: DiskInfo[] = [
    {
      device: '/dev/sda1',
      mountpoint: '/',
      fsType: 'ext4',
      usage: { total: 100 * GB, used: 40 * GB, free: 60 * GB, percent: 40 }
    },
    { device: '/dev/sdb1', mountpoint: '/secret', fsType: 'xfs', usage: 'permission_denied' },
    { device: 'tmpfs', mountpoint: '/run/empty', fsType: 'tmpfs', usage: 'unavailable' }
  ];

  async processes(): Promise<ProcessInfo[]> {
    return this.processList;
  }

  async cpuLoad(): Promise<number> {
    return 17.2;
  }

  async memory(): Promise<MemoryInfo> {
    return this.memoryInfo;
  }

  async disks(): Promise<DiskInfo[]> {
    return this.diskList;
  }

  async terminate(pid: number): Promise<TerminateFailure | null> {
    if (pid === 999999) return 'no_such_process';
    if (pid === 1) return 'access_denied';
    this.terminated.push(pid);
    return null;
  }
}

/**
 * Session environment for tests: home is the temp dir, fixed user and host.
 */
export function testEnvironment(home: string): Record<string, string> {
  return {
    HOME: home,
    USER: 'tester',
    HOSTNAME: 'testhost',
    PATH: process.env.PATH ?? '/usr/local/bin:/usr/bin:/bin'
  };
}

export function createTestSession(dir: string, options: SessionOptions = {}): Session {
  return new Session({ workingDirectory: dir, environment: testEnvironment(dir), ...options });
}

/**
 * Creates a shell engine rooted at `dir` with a fake system provider.
 */
export function createTestShell(
  dir: string,
  options: { session?: SessionOptions; system?: FakeSystemInfo; timeoutMs?: number } = {}
): ShellEngine {
  return new ShellEngine({
    session: createTestSession(dir, options.session),
    system: options.system ?? new FakeSystemInfo(),
    executor: new ExternalExecutor(options.timeoutMs ?? 10_000)
  });
}

/**
 * Execution context for calling builtins directly.
 */
export function createTestContext(dir: string, system: SystemInfoProvider = new FakeSystemInfo()): ExecutionContext {
  return { session: createTestSession(dir), system };
}
