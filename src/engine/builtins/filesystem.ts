import * as fs from 'node:fs';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import type { BuiltinCommand, ExecutionContext } from '../types';
import { OutcomeReport, errnoCode, errorKindFor, errorMessage, fail, succeed } from '../result';
import { formatDateTime, formatPermissions } from '../../utils/format';

/** Directory levels shown by tree below its root. */
export const MAX_TREE_DEPTH = 3;

interface ParsedFlags {
  flags: Set<string>;
  operands: string[];
}

/**
 * Split arguments into single-letter flags and operands.
 * Combined short flags (`-la`) are expanded, and long flags are mapped
 * to their short letter through `longFlags`.
 */
function parseFlags(args: string[], longFlags: Record<string, string> = {}): ParsedFlags {
  const flags = new Set<string>();
  const operands: string[] = [];

  for (const arg of args) {
    if (arg.startsWith('--') && arg.length > 2) {
      const short = longFlags[arg];
      if (short) flags.add(short);
      continue;
    }
    if (arg.startsWith('-') && arg.length > 1) {
      for (const letter of arg.slice(1)) {
        flags.add(letter);
      }
      continue;
    }
    operands.push(arg);
  }

  return { flags, operands };
}

async function statOrNull(target: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(target);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') {
      return null;
    }
    throw error;
  }
}

/**
 * cd - Change the working directory
 * Usage: cd            Go to the home directory
 *        cd <dir>      Relative to the working directory; ~ expands to home
 *        cd -          Go back to the previous directory
 */
export const cd: BuiltinCommand = async (args, { session }) => {
  let target: string;
  if (args.length === 0) {
    target = session.homeDirectory;
  } else if (args[0] === '-') {
    const previous = session.environment.OLDPWD;
    if (!previous) {
      return fail('not_found', 'cd: OLDPWD not set');
    }
    target = previous;
  } else {
    target = session.resolvePath(args[0]);
  }
  target = path.resolve(target);

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(target);
  } catch (error) {
    if (errorKindFor(error) === 'permission_denied') {
      return fail('permission_denied', `Permission denied: ${target}`);
    }
    return fail('not_found', `Directory not found: ${target}`);
  }

  if (!stat.isDirectory()) {
    return fail('conflict', `Not a directory: ${target}`);
  }

  try {
    await fs.promises.access(target, fs.constants.X_OK);
  } catch {
    return fail('permission_denied', `Permission denied: ${target}`);
  }

  session.changeDirectory(target);
  return succeed(`Changed directory to: ${target}`);
};

/**
 * pwd - Print the working directory
 */
export const pwd: BuiltinCommand = async (_args, { session }) => {
  return succeed(session.workingDirectory);
};

/**
 * One `ls -l` line: type, permissions, size, modification time, name.
 */
async function formatLongEntry(fullPath: string, name: string): Promise<string> {
  try {
    const stat = await fs.promises.lstat(fullPath);
    const typeChar = stat.isDirectory() ? 'd' : stat.isSymbolicLink() ? 'l' : '-';
    const size = String(stat.size).padStart(8);
    return `${typeChar}${formatPermissions(stat.mode)} ${size} ${formatDateTime(stat.mtime)} ${name}`;
  } catch {
    return name;
  }
}

/**
 * ls - List directory contents
 * Usage: ls [-a] [-l] [path]
 *   -a, --all    Include entries starting with a dot
 *   -l, --long   Type, permissions, size and modification time per entry
 */
export const ls: BuiltinCommand = async (args, { session }) => {
  const { flags, operands } = parseFlags(args, { '--all': 'a', '--long': 'l' });
  const showHidden = flags.has('a');
  const longFormat = flags.has('l');
  const target = operands[0] ?? '.';
  const resolved = session.resolvePath(target);

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(resolved);
  } catch (error) {
    if (errorKindFor(error) === 'permission_denied') {
      return fail('permission_denied', `Permission denied: ${target}`);
    }
    return fail('not_found', `Path not found: ${target}`);
  }

  if (!stat.isDirectory()) {
    const name = path.basename(resolved);
    return succeed(longFormat ? await formatLongEntry(resolved, name) : name);
  }

  let names: string[];
  try {
    names = await fs.promises.readdir(resolved);
  } catch (error) {
    if (errorKindFor(error) === 'permission_denied') {
      return fail('permission_denied', `Permission denied: ${target}`);
    }
    return fail('io', `Error listing directory: ${errorMessage(error)}`);
  }

  const visible = names.filter(name => showHidden || !name.startsWith('.')).sort();
  if (visible.length === 0) {
    return succeed('Directory is empty');
  }

  if (!longFormat) {
    return succeed(visible.join('\n'));
  }

  const lines = await Promise.all(visible.map(name => formatLongEntry(path.join(resolved, name), name)));
  return succeed(lines.join('\n'));
};

/**
 * mkdir - Create directories, including missing parents
 * Usage: mkdir <dir> [dir2 ...]
 */
export const mkdir: BuiltinCommand = async (args, { session }) => {
  if (args.length === 0) {
    return fail('usage', 'Usage: mkdir <directory_name>');
  }

  const report = new OutcomeReport();
  for (const name of args) {
    try {
      await fs.promises.mkdir(session.resolvePath(name), { recursive: true });
      report.add(`Created directory: ${name}`);
    } catch (error) {
      report.addFailure(errorKindFor(error), `Error creating ${name}: ${errorMessage(error)}`);
    }
  }
  return report.toOutcome();
};

/**
 * rmdir - Remove empty directories
 * Usage: rmdir <dir> [dir2 ...]
 */
export const rmdir: BuiltinCommand = async (args, { session }) => {
  if (args.length === 0) {
    return fail('usage', 'Usage: rmdir <directory_name>');
  }

  const report = new OutcomeReport();
  for (const name of args) {
    try {
      await fs.promises.rmdir(session.resolvePath(name));
      report.add(`Removed directory: ${name}`);
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT') {
        report.addFailure('not_found', `Directory not found: ${name}`);
      } else if (code === 'ENOTEMPTY' || code === 'EEXIST') {
        report.addFailure('conflict', `Directory not empty: ${name}`);
      } else {
        report.addFailure(errorKindFor(error), `Error removing ${name}: ${errorMessage(error)}`);
      }
    }
  }
  return report.toOutcome();
};

/**
 * rm - Remove files and directories
 * Usage: rm [-r] [-f] <file> [file2 ...]
 *   -r, -R, --recursive   Remove directories and their contents
 *   -f, --force           Say nothing about missing files
 */
export const rm: BuiltinCommand = async (args, { session }) => {
  if (args.length === 0) {
    return fail('usage', 'Usage: rm [-r] <file_or_directory>');
  }

  const { flags, operands } = parseFlags(args, { '--recursive': 'r', '--force': 'f' });
  const recursive = flags.has('r') || flags.has('R');
  const force = flags.has('f');

  if (operands.length === 0) {
    return fail('usage', 'No files specified');
  }

  const report = new OutcomeReport();
  for (const name of operands) {
    const target = session.resolvePath(name);
    try {
      const stat = await fs.promises.lstat(target);
      if (stat.isDirectory()) {
        if (!recursive) {
          report.addFailure('conflict', `Cannot remove directory ${name}: use -r flag`);
          continue;
        }
        await fs.promises.rm(target, { recursive: true, force: true });
        report.add(`Removed directory tree: ${name}`);
      } else {
        await fs.promises.unlink(target);
        report.add(`Removed file: ${name}`);
      }
    } catch (error) {
      const kind = errorKindFor(error);
      if (kind === 'not_found') {
        if (!force) report.addFailure('not_found', `File not found: ${name}`);
      } else if (kind === 'permission_denied') {
        report.addFailure(kind, `Permission denied: ${name}`);
      } else {
        report.addFailure(kind, `Error removing ${name}: ${errorMessage(error)}`);
      }
    }
  }
  return report.toOutcome();
};

/**
 * touch - Create empty files or update their modification time
 * Usage: touch <file> [file2 ...]
 */
export const touch: BuiltinCommand = async (args, { session }) => {
  if (args.length === 0) {
    return fail('usage', 'Usage: touch <filename>');
  }

  const report = new OutcomeReport();
  for (const name of args) {
    const target = session.resolvePath(name);
    try {
      const handle = await fs.promises.open(target, 'a');
      await handle.close();
      const now = new Date();
      await fs.promises.utimes(target, now, now);
      report.add(`Touched: ${name}`);
    } catch (error) {
      report.addFailure(errorKindFor(error), `Error touching ${name}: ${errorMessage(error)}`);
    }
  }
  return report.toOutcome();
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode file content as UTF-8 text, or null for binary content.
 */
function decodeText(buffer: Buffer): string | null {
  if (buffer.includes(0)) {
    return null;
  }
  try {
    return utf8.decode(buffer);
  } catch {
    return null;
  }
}

/**
 * cat - Print file contents
 * Usage: cat <file> [file2 ...]
 * With several files each one is preceded by a `==> name <==` header.
 */
export const cat: BuiltinCommand = async (args, { session }) => {
  if (args.length === 0) {
    return fail('usage', 'Usage: cat <filename>');
  }

  const report = new OutcomeReport();
  for (const name of args) {
    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(session.resolvePath(name));
    } catch (error) {
      const kind = errorKindFor(error);
      if (kind === 'not_found') {
        report.addFailure(kind, `File not found: ${name}`);
      } else if (kind === 'permission_denied') {
        report.addFailure(kind, `Permission denied: ${name}`);
      } else if (errnoCode(error) === 'EISDIR') {
        report.addFailure('conflict', `Is a directory: ${name}`);
      } else {
        report.addFailure(kind, `Error reading ${name}: ${errorMessage(error)}`);
      }
      continue;
    }

    const text = decodeText(buffer);
    if (text === null) {
      report.addFailure('invalid_argument', `Cannot display binary file: ${name}`);
      continue;
    }
    if (args.length > 1) {
      report.add(`==> ${name} <==`);
    }
    report.add(text);
  }
  return report.toOutcome();
};

/**
 * echo - Print arguments separated by spaces
 */
export const echo: BuiltinCommand = async (args) => {
  return succeed(args.join(' '));
};

interface TransferPlan {
  destination: string;
  destinationPath: string;
  destinationIsDirectory: boolean;
  sources: string[];
}

/**
 * Work out where each source goes. With several sources the destination
 * must be an existing directory; with one it may be a new path.
 */
async function planTransfer(operands: string[], context: ExecutionContext): Promise<TransferPlan | string> {
  const destination = operands[operands.length - 1];
  const destinationPath = context.session.resolvePath(destination);
  const destinationStat = await statOrNull(destinationPath);
  const destinationIsDirectory = destinationStat?.isDirectory() ?? false;
  const sources = operands.slice(0, -1);

  if (sources.length > 1 && !destinationIsDirectory) {
    return `Target is not a directory: ${destination}`;
  }
  return { destination, destinationPath, destinationIsDirectory, sources };
}

function targetFor(plan: TransferPlan, sourcePath: string): string {
  return plan.destinationIsDirectory
    ? path.join(plan.destinationPath, path.basename(sourcePath))
    : plan.destinationPath;
}

/**
 * cp - Copy files and directories
 * Usage: cp [-r] <source> <destination>
 *        cp [-r] <source>... <directory>
 *   -r, -R, --recursive   Copy directories recursively
 */
export const cp: BuiltinCommand = async (args, context) => {
  if (args.length < 2) {
    return fail('usage', 'Usage: cp [-r] <source> <destination>');
  }

  const { flags, operands } = parseFlags(args, { '--recursive': 'r' });
  const recursive = flags.has('r') || flags.has('R');
  if (operands.length < 2) {
    return fail('usage', 'Source and destination required');
  }

  const plan = await planTransfer(operands, context);
  if (typeof plan === 'string') {
    return fail('conflict', plan);
  }

  const report = new OutcomeReport();
  for (const source of plan.sources) {
    const sourcePath = context.session.resolvePath(source);
    try {
      const stat = await statOrNull(sourcePath);
      if (!stat) {
        report.addFailure('not_found', `Source not found: ${source}`);
        continue;
      }
      const target = targetFor(plan, sourcePath);
      if (stat.isDirectory()) {
        if (!recursive) {
          report.addFailure('conflict', `Cannot copy directory ${source}: use -r flag`);
          continue;
        }
        await fs.promises.cp(sourcePath, target, { recursive: true, preserveTimestamps: true });
        report.add(`Copied directory tree: ${source} -> ${plan.destination}`);
      } else {
        await fs.promises.cp(sourcePath, target, { preserveTimestamps: true });
        report.add(`Copied file: ${source} -> ${plan.destination}`);
      }
    } catch (error) {
      report.addFailure(errorKindFor(error), `Error copying: ${errorMessage(error)}`);
    }
  }
  return report.toOutcome();
};

/**
 * Rename, falling back to copy and delete across filesystems.
 */
async function moveEntry(from: string, to: string): Promise<void> {
  try {
    await fs.promises.rename(from, to);
  } catch (error) {
    if (errnoCode(error) !== 'EXDEV') {
      throw error;
    }
    await fs.promises.cp(from, to, { recursive: true, preserveTimestamps: true });
    await fs.promises.rm(from, { recursive: true, force: true });
  }
}

/**
 * mv - Move or rename files and directories
 * Usage: mv <source> <destination>
 *        mv <source>... <directory>
 */
export const mv: BuiltinCommand = async (args, context) => {
  if (args.length < 2) {
    return fail('usage', 'Usage: mv <source> <destination>');
  }

  const plan = await planTransfer(args, context);
  if (typeof plan === 'string') {
    return fail('conflict', plan);
  }

  const report = new OutcomeReport();
  for (const source of plan.sources) {
    const sourcePath = context.session.resolvePath(source);
    try {
      if (!(await statOrNull(sourcePath))) {
        report.addFailure('not_found', `Source not found: ${source}`);
        continue;
      }
      await moveEntry(sourcePath, targetFor(plan, sourcePath));
      report.add(`Moved: ${source} -> ${plan.destination}`);
    } catch (error) {
      report.addFailure(errorKindFor(error), `Error moving: ${errorMessage(error)}`);
    }
  }
  return report.toOutcome();
};

interface FindOptions {
  root: string;
  namePattern: string | null;
  type: 'f' | 'd' | null;
  remove: boolean;
}

interface FoundEntry {
  display: string;
  fullPath: string;
  isDirectory: boolean;
}

function parseFindArgs(args: string[]): FindOptions | string {
  const options: FindOptions = { root: '', namePattern: null, type: null, remove: false };
  let root: string | null = null;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-name':
        if (i + 1 >= args.length) return 'find: missing argument to -name';
        options.namePattern = args[++i];
        break;
      case '-type': {
        const kind = args[++i];
        if (kind !== 'f' && kind !== 'd') return 'find: -type expects f or d';
        options.type = kind;
        break;
      }
      case '-delete':
        options.remove = true;
        break;
      default:
        if (arg.startsWith('-')) return `find: unknown predicate '${arg}'`;
        if (root !== null) return `find: paths must precede expression: ${arg}`;
        root = arg;
    }
  }

  options.root = root ?? '.';
  return options;
}

/**
 * Walk a tree top-down: at each level directories come before files, both
 * sorted, then each subdirectory is walked in turn. Unreadable directories
 * are skipped.
 */
async function walk(dir: string, display: string, visit: (entry: FoundEntry) => void): Promise<void> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch {
    return;
  }

  const byName = (a: fs.Dirent, b: fs.Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
  const dirs = entries.filter(entry => entry.isDirectory()).sort(byName);
  const files = entries.filter(entry => !entry.isDirectory()).sort(byName);
  const childDisplay = (name: string) => (display === '/' ? `/${name}` : `${display}/${name}`);

  for (const entry of [...dirs, ...files]) {
    visit({
      display: childDisplay(entry.name),
      fullPath: path.join(dir, entry.name),
      isDirectory: entry.isDirectory()
    });
  }
  for (const entry of dirs) {
    await walk(path.join(dir, entry.name), childDisplay(entry.name), visit);
  }
}

/**
 * find - Search a directory tree
 * Usage: find <path> [-name <glob>] [-type f|d] [-delete]
 * The -name pattern uses shell glob syntax (*, ?, [abc]) against the entry name.
 */
export const find: BuiltinCommand = async (args, { session }) => {
  if (args.length === 0) {
    return fail('usage', 'Usage: find <path> -name <pattern>');
  }

  const options = parseFindArgs(args);
  if (typeof options === 'string') {
    return fail('usage', options);
  }

  const rootPath = session.resolvePath(options.root);
  if (!(await statOrNull(rootPath))) {
    return fail('not_found', `Path not found: ${options.root}`);
  }

  const rootDisplay = options.root.replace(/\/+$/, '') || '/';
  const matches: FoundEntry[] = [];
  await walk(rootPath, rootDisplay, entry => {
    if (options.namePattern !== null && !minimatch(path.basename(entry.fullPath), options.namePattern, { dot: true })) {
      return;
    }
    if (options.type === 'f' && entry.isDirectory) return;
    if (options.type === 'd' && !entry.isDirectory) return;
    matches.push(entry);
  });

  if (matches.length === 0) {
    return succeed('No matches found');
  }
  if (!options.remove) {
    return succeed(matches.map(entry => entry.display).join('\n'));
  }

  const report = new OutcomeReport();
  // Deepest entries first so a directory is emptied before it is removed
  for (const entry of [...matches].reverse()) {
    try {
      await fs.promises.rm(entry.fullPath, { recursive: entry.isDirectory, force: true });
      report.add(`Deleted: ${entry.display}`);
    } catch (error) {
      report.addFailure(errorKindFor(error), `Error deleting ${entry.display}: ${errorMessage(error)}`);
    }
  }
  return report.toOutcome();
};

/**
 * grep - Print lines containing a literal string
 * Usage: grep <pattern> <file> [file2 ...]
 * Each match is printed as `<line-number>: <line>`, prefixed with `<file>:`
 * when several files are searched. The pattern is not a regular expression.
 */
export const grep: BuiltinCommand = async (args, { session }) => {
  if (args.length < 2) {
    return fail('usage', 'Usage: grep <pattern> <file>');
  }

  const [pattern, ...files] = args;
  const report = new OutcomeReport();
  let searched = 0;
  let matched = false;

  for (const file of files) {
    let content: string;
    try {
      content = await fs.promises.readFile(session.resolvePath(file), 'utf8');
    } catch (error) {
      const kind = errorKindFor(error);
      report.addFailure(kind, kind === 'not_found' ? `File not found: ${file}` : `Error in grep: ${errorMessage(error)}`);
      continue;
    }
    searched++;

    const lines = content.split(/\r?\n/);
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    const prefix = files.length > 1 ? `${file}:` : '';
    lines.forEach((line, index) => {
      if (line.includes(pattern)) {
        matched = true;
        report.add(`${prefix}${index + 1}: ${line.trimEnd()}`);
      }
    });
  }

  if (searched > 0 && !matched) {
    report.add(`No matches found for '${pattern}'`);
  }
  return report.toOutcome();
};

async function buildTree(dir: string, prefix: string, lines: string[], depth: number): Promise<void> {
  if (depth >= MAX_TREE_DEPTH) {
    return;
  }

  let names: string[];
  try {
    names = (await fs.promises.readdir(dir)).filter(name => !name.startsWith('.')).sort();
  } catch (error) {
    if (errorKindFor(error) === 'permission_denied') {
      lines.push(`${prefix}└── [Permission Denied]`);
      return;
    }
    throw error;
  }

  for (let i = 0; i < names.length; i++) {
    const name = names[i];
    const isLast = i === names.length - 1;
    lines.push(`${prefix}${isLast ? '└── ' : '├── '}${name}`);

    const childPath = path.join(dir, name);
    const stat = await statOrNull(childPath);
    if (stat?.isDirectory()) {
      await buildTree(childPath, prefix + (isLast ? '    ' : '│   '), lines, depth + 1);
    }
  }
}

/**
 * tree - Show a directory tree, three levels deep, without dot-entries
 * Usage: tree [path]
 */
export const tree: BuiltinCommand = async (args, { session }) => {
  const target = args[0] ?? '.';
  const root = session.resolvePath(target);

  const stat = await statOrNull(root);
  if (!stat) {
    return fail('not_found', `Path not found: ${target}`);
  }

  const lines = [path.basename(root) || root];
  if (stat.isDirectory()) {
    try {
      await buildTree(root, '', lines, 0);
    } catch (error) {
      return fail(errorKindFor(error), `Error building tree: ${errorMessage(error)}`);
    }
  }
  return succeed(lines.join('\n'));
};
