import { checkpointSchema, type Checkpoint, type CheckpointScope } from './checkpointSchema.js';

/**
 * Durable home of a scope's checkpoint
 */
export interface CheckpointStore {
  load(scope: CheckpointScope): Promise<Checkpoint | null>;
  save(checkpoint: Checkpoint): Promise<void>;
  remove(scope: CheckpointScope): Promise<void>;
}

/**
 * File-name-safe key for a (category, time period) scope
 */
export function scopeSlug(scope: CheckpointScope): string {
  const slug = `${scope.category}-${scope.timePeriod}`
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'default';
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, string>();
  saves = 0;

  async load(scope: CheckpointScope): Promise<Checkpoint | null> {
    const raw = this.checkpoints.get(scopeSlug(scope));
    return raw ? checkpointSchema.parse(JSON.parse(raw)) : null;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    this.saves++;
    this.checkpoints.set(scopeSlug(checkpoint.scope), JSON.stringify(checkpoint));
  }

  async remove(scope: CheckpointScope): Promise<void> {
    this.checkpoints.delete(scopeSlug(scope));
  }
}
