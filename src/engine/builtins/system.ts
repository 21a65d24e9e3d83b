import type { BuiltinCommand } from '../types';
import type { DiskInfo, DiskUsage, ProcessInfo, TerminateFailure } from '../sysinfo';
import { errorMessage, fail, succeed } from '../result';
import { formatDateTime, formatGigabytes } from '../../utils/format';

/** Terminal control sequence: erase the screen and home the cursor. */
export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/** Entries shown by `history` without an argument. */
export const HISTORY_DISPLAY_COUNT = 50;

const isMeasured = (disk: DiskInfo): disk is DiskInfo & { usage: DiskUsage } =>
  typeof disk.usage !== 'string';

/** Processes listed by `top`. */
export const TOP_PROCESS_COUNT = 10;

const RULE = '-'.repeat(45);
const PROCESS_HEADER = `${'PID'.padEnd(5)} ${'NAME'.padEnd(20)} ${'CPU%'.padEnd(6)} MEM%`;

function formatProcessRow(proc: ProcessInfo): string {
  return `${String(proc.pid).padEnd(5)} ${proc.name.padEnd(20)} ${proc.cpu.toFixed(1).padEnd(6)} ${proc.mem.toFixed(1)}`;
}

/**
 * ps - List running processes
 */
export const ps: BuiltinCommand = async (_args, { system }) => {
  try {
    const processes = await system.processes();
    return succeed([PROCESS_HEADER, RULE, ...processes.map(formatProcessRow)].join('\n'));
  } catch (error) {
    return fail('io', `Error listing processes: ${errorMessage(error)}`);
  }
};

/**
 * top - System resource snapshot plus the busiest processes by CPU
 */
export const top: BuiltinCommand = async (_args, { system }) => {
  try {
    const [cpu, memory, disks, processes] = await Promise.all([
      system.cpuLoad(),
      system.memory(),
      system.disks(),
      system.processes()
    ]);

    const measured = disks.filter(isMeasured);
    const root = measured.find(disk => disk.mountpoint === '/') ?? measured.at(0);
    const diskLine = root
      ? `Disk Usage: ${root.usage.percent.toFixed(1)}% (${formatGigabytes(root.usage.used)}GB / ${formatGigabytes(root.usage.total)}GB)`
      : 'Disk Usage: unavailable';

    const busiest = [...processes].sort((a, b) => b.cpu - a.cpu).slice(0, TOP_PROCESS_COUNT);

    const lines = [
      'System Resource Usage',
      '='.repeat(30),
      `CPU Usage: ${cpu.toFixed(1)}%`,
      `Memory Usage: ${memory.percent.toFixed(1)}% (${formatGigabytes(memory.used)}GB / ${formatGigabytes(memory.total)}GB)`,
      diskLine,
      '',
      'Top Processes by CPU:',
      PROCESS_HEADER,
      RULE,
      ...busiest.map(formatProcessRow)
    ];
    return succeed(lines.join('\n'));
  } catch (error) {
    return fail('io', `Error getting system info: ${errorMessage(error)}`);
  }
};

/**
 * df - Disk usage per mounted partition
 * Partitions that cannot be read are reported and skipped.
 */
export const df: BuiltinCommand = async (_args, { system }) => {
  try {
    const disks = await system.disks();
    const lines = ['Filesystem Usage', '='.repeat(30)];

    for (const disk of disks) {
      if (disk.usage === 'permission_denied') {
        lines.push(`Permission denied: ${disk.device}`, '');
        continue;
      }
      if (disk.usage === 'unavailable') {
        lines.push(`Usage unavailable: ${disk.device}`, '');
        continue;
      }
      lines.push(
        `Device: ${disk.device}`,
        `  Mountpoint: ${disk.mountpoint}`,
        `  File system: ${disk.fsType}`,
        `  Total: ${formatGigabytes(disk.usage.total)}GB`,
        `  Used: ${formatGigabytes(disk.usage.used)}GB (${disk.usage.percent.toFixed(1)}%)`,
        `  Free: ${formatGigabytes(disk.usage.free)}GB`,
        ''
      );
    }

    return succeed(lines.join('\n').trimEnd());
  } catch (error) {
    return fail('io', `Error getting disk info: ${errorMessage(error)}`);
  }
};

/**
 * free - Memory and swap usage
 */
export const free: BuiltinCommand = async (_args, { system }) => {
  try {
    const memory = await system.memory();
    const lines = [
      'Memory Usage Information',
      '='.repeat(30),
      `Total RAM: ${formatGigabytes(memory.total)}GB`,
      `Available RAM: ${formatGigabytes(memory.available)}GB`,
      `Used RAM: ${formatGigabytes(memory.used)}GB (${memory.percent.toFixed(1)}%)`,
      `Free RAM: ${formatGigabytes(memory.free)}GB`,
      '',
      `Total Swap: ${formatGigabytes(memory.swapTotal)}GB`,
      `Used Swap: ${formatGigabytes(memory.swapUsed)}GB (${memory.swapPercent.toFixed(1)}%)`,
      `Free Swap: ${formatGigabytes(memory.swapFree)}GB`
    ];
    return succeed(lines.join('\n'));
  } catch (error) {
    return fail('io', `Error getting memory info: ${errorMessage(error)}`);
  }
};

/** Largest PID the kernel hands out; anything above is not a process. */
const MAX_PID = 2 ** 31 - 1;

/**
 * kill - Terminate a process by PID
 * Usage: kill <pid>
 *
 * PID 0 addresses the caller's whole process group and is refused.
 */
export const kill: BuiltinCommand = async (args, { system }) => {
  if (args.length === 0) {
    return fail('usage', 'Usage: kill <pid>');
  }

  const raw = args[0];
  const pid = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(pid) || pid < 1 || pid > MAX_PID) {
    return fail('invalid_argument', 'Invalid PID: must be a number');
  }

  let failure: TerminateFailure | null;
  try {
    failure = await system.terminate(pid);
  } catch (error) {
    return fail('io', `Error killing process: ${errorMessage(error)}`);
  }

  switch (failure) {
    case 'no_such_process':
      return fail('not_found', `No such process: ${raw}`);
    case 'access_denied':
      return fail('permission_denied', `Access denied: cannot kill process ${raw}`);
    default:
      return succeed(`Process ${pid} terminated`);
  }
};

/**
 * history - Show recent commands, numbered from 1
 * Usage: history [count]     (default: last 50)
 */
export const history: BuiltinCommand = async (args, { session }) => {
  let count = HISTORY_DISPLAY_COUNT;
  if (args.length > 0) {
    if (!/^\d+$/.test(args[0])) {
      return fail('usage', `history: invalid argument '${args[0]}'`);
    }
    count = Number(args[0]);
  }

  const entries = session.recentHistory(count);
  if (entries.length === 0) {
    return succeed('No command history');
  }

  return succeed(entries.map((line, index) => `${String(index + 1).padStart(3)}  ${line}`).join('\n'));
};

/**
 * clear - Emit the clear-screen sequence for the front end to print
 */
export const clear: BuiltinCommand = async () => {
  return succeed(CLEAR_SCREEN);
};

/**
 * date - Current local date and time
 */
export const date: BuiltinCommand = async () => {
  return succeed(formatDateTime(new Date(), true));
};
