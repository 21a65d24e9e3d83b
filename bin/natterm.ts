#!/usr/bin/env node
/**
 * @fileoverview natterm CLI entry point.
 *
 * Usage:
 *   natterm              # Plain command terminal
 *   natterm cli          # Same as above
 *   natterm ai           # Natural-language interpretation enabled
 *   natterm --help
 *   natterm --version
 *
 * @module bin/natterm
 */

import { ShellEngine } from '../src/engine/shell';
import { Session } from '../src/engine/session';
import { ExternalExecutor } from '../src/engine/executor';
import { Repl, type ReplMode } from '../src/cli/repl';
import { loadConfig } from '../src/persistence/config';
import { HistoryFile } from '../src/persistence/history';
import { VERSION_STRING } from '../src/version';

/**
 * Parse command line arguments.
 */
interface CLIArgs {
  mode: ReplMode;
  help: boolean;
  version: boolean;
  unknown: string[];
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    mode: 'cli',
    help: false,
    version: false,
    unknown: []
  };

  for (const arg of args) {
    switch (arg) {
      case 'cli':
      case 'ai':
        result.mode = arg;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--version':
      case '-v':
        result.version = true;
        break;
      default:
        result.unknown.push(arg);
    }
  }

  return result;
}

function showHelp(): void {
  console.log(`natterm - terminal with natural-language commands

Usage: natterm [cli|ai] [options]

Modes:
  cli                     Plain command terminal (default)
  ai                      Interpret natural language before running

Options:
  --help, -h              Show this help message
  --version, -v           Show version information

Environment:
  NATTERM_DATA_DIR             Data directory (default: ~/.natterm)
  NATTERM_COMMAND_TIMEOUT_MS   External command timeout
  NATTERM_HISTORY_LIMIT        History entries kept

Examples:
  natterm                     Start the command terminal
  natterm ai                  Start with natural-language interpretation
`);
}

/**
 * Main CLI entry point.
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.version) {
    console.log(VERSION_STRING);
    return;
  }

  if (args.help) {
    showHelp();
    return;
  }

  if (args.unknown.length > 0) {
    console.error(`Unknown argument: ${args.unknown[0]}`);
    showHelp();
    process.exitCode = 2;
    return;
  }

  const config = await loadConfig();
  const historyFile = new HistoryFile(config.historyFile);

  let history: string[] = [];
  try {
    history = await historyFile.load(config.historyLimit);
  } catch (error) {
    console.warn(`Failed to read ${historyFile.filePath}:`, error);
  }

  const engine = new ShellEngine({
    session: new Session({ history, historyLimit: config.historyLimit }),
    executor: new ExternalExecutor(config.commandTimeoutMs),
    onHistoryAppend: line => {
      historyFile.append(line).catch((error: unknown) => {
        console.warn(`Failed to append to ${historyFile.filePath}:`, error);
      });
    }
  });

  const repl = new Repl({ mode: args.mode, engine, history: historyFile });
  process.stdout.write(repl.banner());
  await repl.run();
}

// Run the CLI
main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
