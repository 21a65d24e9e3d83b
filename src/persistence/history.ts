/**
 * @fileoverview Command history file for the CLI.
 *
 * One command per line, oldest first. Lines are appended as commands run;
 * on exit the file is rewritten with only the newest entries, through a
 * temporary file and a rename.
 *
 * @module persistence/history
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { errnoCode } from "../engine/result";

export class HistoryFile {
  readonly filePath: string;
  /** Tail of the write chain; appends and rewrites never interleave */
  private pending: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Read the newest `limit` entries. A missing file is an empty history.
   */
  async load(limit: number): Promise<string[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return [];
      }
      throw error;
    }

    const lines = content.split("\n").filter(line => line.trim() !== "");
    return limit > 0 ? lines.slice(-limit) : [];
  }

  /**
   * Append one entry. Multi-line input is stored on a single line.
   */
  append(line: string): Promise<void> {
    const entry = line.replace(/[\r\n]+/g, " ");
    return this.enqueue(async () => {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.appendFile(this.filePath, entry + "\n", "utf-8");
    });
  }

  /**
   * Replace the file contents with `entries`, keeping the newest `limit`.
   */
  save(entries: readonly string[], limit: number): Promise<void> {
    const kept = entries.slice(-limit).map(line => line.replace(/[\r\n]+/g, " "));
    const tmpPath = this.filePath + ".tmp";
    return this.enqueue(async () => {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      try {
        await fs.promises.writeFile(tmpPath, kept.map(line => line + "\n").join(""), "utf-8");
        await fs.promises.rename(tmpPath, this.filePath);
      } catch (error) {
        // Clean up temp file on failure
        await fs.promises.rm(tmpPath, { force: true });
        throw error;
      }
    });
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.pending.then(task);
    // Later writes still run after a failed one
    this.pending = run.catch(() => undefined);
    return run;
  }
}
