/**
 * Frontier State Store
 * JSON persistence of frontier snapshots for resumable crawls
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { StorageError, isMissingFile } from '../errors';
import { FrontierSnapshot, TaskKind } from './crawling.types';

const PendingTaskSchema = z.object({
  url: z.string().min(1),
  depth: z.number().int().min(0),
  kind: z.nativeEnum(TaskKind),
  parentUrl: z.string().optional(),
});

const FrontierSnapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  completed: z.array(z.string()),
  pending: z.array(PendingTaskSchema),
});

export class FrontierStateStore {
  constructor(private readonly filePath: string) {}

  /**
   * Read the saved snapshot. Null when there is none yet.
   */
  async load(): Promise<FrontierSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new StorageError('could not read frontier state', this.filePath, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error: unknown) {
      throw new StorageError('frontier state is not valid JSON', this.filePath, error);
    }

    const result = FrontierSnapshotSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new StorageError(`frontier state is malformed (${issues.join('; ')})`, this.filePath);
    }
    return result.data;
  }

  /**
   * Write the snapshot atomically (temp file + rename)
   */
  async save(snapshot: FrontierSnapshot): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error: unknown) {
      throw new StorageError('could not write frontier state', this.filePath, error);
    }
  }

  getPath(): string {
    return this.filePath;
  }
}
