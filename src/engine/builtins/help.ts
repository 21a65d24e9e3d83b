import type { BuiltinCommand } from '../types';
import { fail, succeed } from '../result';

interface HelpSection {
  title: string;
  entries: Array<[names: string, description: string]>;
}

const SECTIONS: HelpSection[] = [
  {
    title: 'File Operations',
    entries: [
      ['ls, dir', 'List directory contents'],
      ['cd', 'Change directory'],
      ['pwd', 'Print working directory'],
      ['mkdir', 'Create directories'],
      ['rmdir', 'Remove empty directories'],
      ['rm, del', 'Remove files/directories'],
      ['touch', 'Create empty file or update its timestamp'],
      ['cat, type', 'Display file contents'],
      ['cp, copy', 'Copy files/directories'],
      ['mv, move', 'Move/rename files/directories'],
      ['find', 'Find files and directories'],
      ['grep', 'Search text in files'],
      ['tree', 'Display directory tree']
    ]
  },
  {
    title: 'System Monitoring',
    entries: [
      ['ps', 'List processes'],
      ['kill', 'Terminate process by PID'],
      ['top', 'Display system resource usage'],
      ['df', 'Display filesystem usage'],
      ['free', 'Display memory usage']
    ]
  },
  {
    title: 'Utilities',
    entries: [
      ['echo', 'Print text'],
      ['whoami', 'Display current user'],
      ['date', 'Display current date/time'],
      ['history', 'Show command history'],
      ['clear, cls', 'Clear screen'],
      ['env', 'Show environment variables'],
      ['set', 'Set an environment variable'],
      ['alias, unalias', 'Manage command aliases'],
      ['help', 'Show this help']
    ]
  },
  {
    title: 'Session',
    entries: [['exit, quit', 'Exit terminal']]
  }
];

// Detailed help for `help <command>`
const COMMAND_HELP: Record<string, { usage: string; description: string }> = {
  ls: { usage: 'ls [-a] [-l] [path]', description: 'List directory contents. -a shows dot-entries, -l shows details.' },
  cd: { usage: 'cd [directory]', description: 'Change the working directory. No argument goes home, - goes back.' },
  mkdir: { usage: 'mkdir directory...', description: 'Create directories, including missing parents.' },
  rmdir: { usage: 'rmdir directory...', description: 'Remove empty directories.' },
  rm: { usage: 'rm [-r] [-f] file...', description: 'Remove files. -r removes directories, -f ignores missing files.' },
  touch: { usage: 'touch file...', description: 'Create files or update their modification time.' },
  cat: { usage: 'cat file...', description: 'Print files; several files get ==> name <== headers.' },
  cp: { usage: 'cp [-r] source... destination', description: 'Copy files. -r is required for directories.' },
  mv: { usage: 'mv source... destination', description: 'Move or rename files and directories.' },
  find: { usage: 'find path [-name glob] [-type f|d] [-delete]', description: 'Walk a directory tree and print matching paths.' },
  grep: { usage: 'grep text file...', description: 'Print lines containing the literal text, with line numbers.' },
  tree: { usage: 'tree [path]', description: 'Show the directory tree, three levels deep.' },
  kill: { usage: 'kill pid', description: 'Send SIGTERM to a process.' },
  history: { usage: 'history [count]', description: 'Show the last commands (default 50).' },
  alias: { usage: 'alias [name=command]', description: 'List aliases or define one.' },
  unalias: { usage: 'unalias [-a] name...', description: 'Remove aliases.' },
  set: { usage: 'set NAME=value', description: 'Set an environment variable for this session and its child processes.' }
};

const NAME_COLUMN = 17;

function renderOverview(): string {
  const lines = ['natterm - Available Commands:', ''];
  for (const section of SECTIONS) {
    lines.push(`${section.title}:`);
    for (const [names, description] of section.entries) {
      lines.push(`  ${names.padEnd(NAME_COLUMN)}- ${description}`);
    }
    lines.push('');
  }
  lines.push('Use help <command> for details on a single command.');
  lines.push('Commands that are not built in run as external programs.');
  return lines.join('\n');
}

/**
 * help - Show the command reference
 * Usage: help              Overview of all builtins
 *        help <command>    Usage line for one command
 */
export const help: BuiltinCommand = async (args) => {
  if (args.length === 0) {
    return succeed(renderOverview());
  }

  if (!Object.prototype.hasOwnProperty.call(COMMAND_HELP, args[0])) {
    return fail('not_found', `help: no detailed help for '${args[0]}'`);
  }
  const entry = COMMAND_HELP[args[0]];
  return succeed(`Usage: ${entry.usage}\n${entry.description}`);
};
