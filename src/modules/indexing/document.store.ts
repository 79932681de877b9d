/**
 * Document Store
 * JSONL output of document records plus the alias sidecar
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { StorageError, isMissingFile } from '../../lib/errors';
import { AliasMap, DocumentRecord, DocumentRecordSchema } from './document-record';

const AliasMapSchema = z.record(z.array(z.string()));

export interface StoredOutput {
  records: DocumentRecord[];
  aliases: AliasMap;
}

export class DocumentStore {
  private readonly aliasPath: string;

  constructor(private readonly outputPath: string) {
    this.aliasPath = `${outputPath}.aliases.json`;
  }

  /**
   * Records and aliases from an earlier run; empty when there are none
   */
  async load(): Promise<StoredOutput> {
    const content = await this.readOptional(this.outputPath);
    const records: DocumentRecord[] = [];

    if (content !== null) {
      const lines = content.split('\n');
      lines.forEach((line, index) => {
        if (line.trim().length === 0) return;
        records.push(this.parseLine(line, index + 1));
      });
    }

    const aliasContent = await this.readOptional(this.aliasPath);
    let aliases: AliasMap = {};
    if (aliasContent !== null) {
      let json: unknown;
      try {
        json = JSON.parse(aliasContent);
      } catch (error: unknown) {
        throw new StorageError('alias file is not valid JSON', this.aliasPath, error);
      }
      const result = AliasMapSchema.safeParse(json);
      if (!result.success) {
        throw new StorageError('alias file must map content hashes to URL lists', this.aliasPath);
      }
      aliases = result.data;
    }

    return { records, aliases };
  }

  /**
   * Replace the output with these records (temp file + rename)
   */
  async save(records: DocumentRecord[], aliases: AliasMap): Promise<void> {
    const jsonl = records.map((record) => JSON.stringify(record)).join('\n');
    await this.writeAtomic(this.outputPath, records.length > 0 ? `${jsonl}\n` : '');
    await this.writeAtomic(this.aliasPath, `${JSON.stringify(aliases, null, 2)}\n`);
  }

  getPath(): string {
    return this.outputPath;
  }

  getAliasPath(): string {
    return this.aliasPath;
  }

  private parseLine(line: string, lineNumber: number): DocumentRecord {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error: unknown) {
      throw new StorageError(`line ${lineNumber} is not valid JSON`, this.outputPath, error);
    }
    const result = DocumentRecordSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new StorageError(`line ${lineNumber} is not a document record (${issues.join('; ')})`, this.outputPath);
    }
    return result.data;
  }

  private async readOptional(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new StorageError('could not read file', filePath, error);
    }
  }

  private async writeAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempPath, content, 'utf8');
      await fs.rename(tempPath, filePath);
    } catch (error: unknown) {
      throw new StorageError('could not write output', filePath, error);
    }
  }
}
