/**
 * WinningPathStore: append-only JSONL log of winning paths (the data flywheel).
 *
 * One file per run: `{YYYYMMDD_HHMMSS}_{hash(problem) mod 10000:04d}.jsonl`,
 * one JSON object per line. Records can additionally be mirrored to an
 * experience repository; mirror failures are logged and dropped.
 */

import { join } from 'path';
import type { WinningPath } from '../reasoning/lats/winning-path.js';
import { parseWinningPath, serializeWinningPath } from '../reasoning/lats/winning-path.js';
import type { ExperienceRepository } from './experience.js';
import { toAgentExperience } from './experience.js';
import { appendLine, listFiles, readFileSafeAsync } from '../utils/fs.js';
import { hashBucket } from '../utils/crypto.js';
import { PersistenceError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function winningPathFileName(problem: string, date: Date): string {
  return `${formatRunTimestamp(date)}_${pad(hashBucket(problem), 4)}.jsonl`;
}

export class WinningPathStore {
  private logger = getLogger();

  constructor(
    private dir: string,
    private experienceRepository?: ExperienceRepository,
  ) {}

  getDirectory(): string {
    return this.dir;
  }

  /**
   * Append the record to its run file, then mirror it. Returns the file path.
   */
  async save(path: WinningPath, now: Date = new Date()): Promise<string> {
    const filePath = join(this.dir, winningPathFileName(path.problemDescription, now));

    try {
      await appendLine(filePath, serializeWinningPath(path));
    } catch (err) {
      throw new PersistenceError(`Failed to write winning path to ${filePath}`, filePath, toError(err));
    }
    this.logger.info({ filePath, strategyId: path.finalStrategyId }, 'Winning path saved to file');

    await this.mirror(path);
    return filePath;
  }

  async list(): Promise<string[]> {
    return listFiles(this.dir, '.jsonl');
  }

  async read(filePath: string): Promise<WinningPath[]> {
    const content = await readFileSafeAsync(filePath);
    if (content === null) {
      throw new PersistenceError(`Cannot read winning path file ${filePath}`, filePath);
    }

    const paths: WinningPath[] = [];
    content.split('\n').forEach((line, index) => {
      if (line.trim() === '') return;
      paths.push(parseWinningPath(line, index + 1));
    });
    return paths;
  }

  private async mirror(path: WinningPath): Promise<void> {
    if (!this.experienceRepository) return;

    try {
      await this.experienceRepository.save(toAgentExperience(path));
      this.logger.info({ strategyId: path.finalStrategyId }, 'Winning path saved to experience store');
    } catch (err) {
      this.logger.warn({ error: toError(err).message }, 'Failed to save winning path to experience store');
    }
  }
}
