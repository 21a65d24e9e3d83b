/**
 * @fileoverview natterm configuration.
 *
 * Settings come from, in increasing priority:
 * - built-in defaults
 * - <dataDir>/config.json
 * - NATTERM_* environment variables
 *
 * Data directory: ~/.natterm/, or NATTERM_DATA_DIR if set.
 *
 * config.json:
 * {
 *   "commandTimeoutMs": 30000,   // external command timeout
 *   "historyLimit": 1000,        // entries kept per session
 *   "historyFile": "/path/to/history"
 * }
 *
 * Fields with the wrong type are ignored with a warning.
 *
 * @module persistence/config
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_COMMAND_TIMEOUT_MS } from "../engine/executor";
import { DEFAULT_HISTORY_LIMIT } from "../engine/session";
import { errnoCode } from "../engine/result";

export interface NattermConfig {
  dataDir: string;
  commandTimeoutMs: number;
  historyLimit: number;
  historyFile: string;
}

/**
 * Get the natterm data directory path.
 * Uses ~/.natterm/ or NATTERM_DATA_DIR environment variable if set.
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const envDir = env.NATTERM_DATA_DIR;
  if (envDir) {
    return envDir;
  }
  return path.join(os.homedir(), ".natterm");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return {};
    }
    console.error(`Failed to read ${filePath}:`, error);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    console.warn(`Ignoring ${filePath}: invalid JSON format`);
    return {};
  }

  if (!isRecord(parsed)) {
    console.warn(`Ignoring ${filePath}: expected a JSON object`);
    return {};
  }
  return parsed;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!isPositiveInteger(value)) {
    console.warn(`Ignoring ${name}=${raw}: expected a positive integer`);
    return undefined;
  }
  return value;
}

/**
 * Load the effective configuration.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<NattermConfig> {
  const dataDir = getDataDir(env);
  const configFile = path.join(dataDir, "config.json");
  const stored = await readConfigFile(configFile);

  const config: NattermConfig = {
    dataDir,
    commandTimeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
    historyLimit: DEFAULT_HISTORY_LIMIT,
    historyFile: path.join(dataDir, "history")
  };

  if (stored.commandTimeoutMs !== undefined) {
    if (isPositiveInteger(stored.commandTimeoutMs)) {
      config.commandTimeoutMs = stored.commandTimeoutMs;
    } else {
      console.warn(`Ignoring commandTimeoutMs in ${configFile}: expected a positive integer`);
    }
  }

  if (stored.historyLimit !== undefined) {
    if (isPositiveInteger(stored.historyLimit)) {
      config.historyLimit = stored.historyLimit;
    } else {
      console.warn(`Ignoring historyLimit in ${configFile}: expected a positive integer`);
    }
  }

  if (stored.historyFile !== undefined) {
    if (typeof stored.historyFile === "string" && stored.historyFile !== "") {
      config.historyFile = path.resolve(dataDir, stored.historyFile);
    } else {
      console.warn(`Ignoring historyFile in ${configFile}: expected a non-empty string`);
    }
  }

  config.commandTimeoutMs = envNumber(env, "NATTERM_COMMAND_TIMEOUT_MS") ?? config.commandTimeoutMs;
  config.historyLimit = envNumber(env, "NATTERM_HISTORY_LIMIT") ?? config.historyLimit;

  return config;
}
