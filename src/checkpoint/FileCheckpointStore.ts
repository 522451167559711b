/**
 * FileCheckpointStore
 *
 * One JSON file per scope under the checkpoint directory. Saves write a temp
 * file, move the current file to .bak, then rename the temp file into place;
 * a load that finds the main file missing or corrupt falls back to .bak.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { randomBytes } from 'crypto';
import type { Logger } from 'pino';
import { checkpointFileSchema, type Checkpoint, type CheckpointScope } from './checkpointSchema.js';
import { scopeSlug, type CheckpointStore } from './CheckpointStore.js';
import { completedByStage } from './transitions.js';
import { logger as rootLogger } from '../utils/logger.js';

function isNotFound(error: unknown): boolean {
  return !!error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT';
}

export class FileCheckpointStore implements CheckpointStore {
  private readonly log: Logger;

  constructor(
    private readonly directory: string,
    logger?: Logger
  ) {
    this.log = logger ?? rootLogger.child({ component: 'checkpoint-store' });
  }

  pathFor(scope: CheckpointScope): string {
    return join(this.directory, `checkpoint-${scopeSlug(scope)}.json`);
  }

  private async readFile(path: string): Promise<Checkpoint | null> {
    let raw: string;
    try {
      raw = await fs.readFile(path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.log.warn({ path, error }, 'Checkpoint file is not valid JSON');
      return null;
    }

    const parsed = checkpointFileSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ path, issues: parsed.error.issues.slice(0, 5) }, 'Checkpoint file failed validation');
      return null;
    }
    const { completedByStage: _derived, ...checkpoint } = parsed.data;
    return checkpoint;
  }

  async load(scope: CheckpointScope): Promise<Checkpoint | null> {
    const path = this.pathFor(scope);
    const checkpoint = await this.readFile(path);
    if (checkpoint) {
      return checkpoint;
    }

    const backup = await this.readFile(`${path}.bak`);
    if (backup) {
      this.log.warn({ path }, 'Recovered checkpoint from backup copy');
    }
    return backup;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const path = this.pathFor(checkpoint.scope);
    const tempPath = `${path}.${randomBytes(6).toString('hex')}.tmp`;
    const body = JSON.stringify({ ...checkpoint, completedByStage: completedByStage(checkpoint) }, null, 2);

    await fs.mkdir(this.directory, { recursive: true });
    try {
      await fs.writeFile(tempPath, body, 'utf8');
      try {
        await fs.rename(path, `${path}.bak`);
      } catch (error) {
        if (!isNotFound(error)) {
          throw error;
        }
      }
      await fs.rename(tempPath, path);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  async remove(scope: CheckpointScope): Promise<void> {
    const path = this.pathFor(scope);
    await fs.rm(path, { force: true });
    await fs.rm(`${path}.bak`, { force: true });
  }
}
