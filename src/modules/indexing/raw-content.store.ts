/**
 * Raw Content Store
 * Fetched HTML and PDF bodies mirrored on disk as rawDir/<host>/<path>
 */

import { Dirent, promises as fs } from 'fs';
import path from 'path';
import { StorageError, isMissingFile } from '../../lib/errors';
import { DocumentFormat } from '../../lib/parsing';

const INDEX_FILE = 'index.html';
const UNSAFE_CHARACTERS = /[^A-Za-z0-9._-]/g;

export interface RawContentStoreConfig {
  rawDir: string;
  saveHtml: boolean;
  savePdf: boolean;
}

export class RawContentStore {
  constructor(private readonly config: RawContentStoreConfig) {}

  shouldSave(format: DocumentFormat): boolean {
    return format === DocumentFormat.PDF ? this.config.savePdf : this.config.saveHtml;
  }

  /**
   * File path for a URL. Query and fragment are ignored; a path without a
   * file name maps to index.html in that directory.
   */
  pathFor(url: string): string {
    const parsed = new URL(url);
    const segments = parsed.pathname
      .split('/')
      .filter((segment) => segment.length > 0)
      .map(sanitizeSegment);

    const last = segments[segments.length - 1];
    if (last === undefined || !last.includes('.')) {
      segments.push(INDEX_FILE);
    }

    return path.join(this.config.rawDir, sanitizeSegment(parsed.host.toLowerCase()), ...segments);
  }

  /**
   * Write a body (temp file + rename). Returns the path, or null when this
   * format is not kept.
   */
  async save(url: string, body: Buffer, format: DocumentFormat): Promise<string | null> {
    if (!this.shouldSave(format)) {
      return null;
    }

    const filePath = this.pathFor(url);
    const tempPath = `${filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempPath, body);
      await fs.rename(tempPath, filePath);
    } catch (error: unknown) {
      throw new StorageError('could not save raw content', filePath, error);
    }
    return filePath;
  }

  async exists(url: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(url));
      return true;
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        return false;
      }
      throw new StorageError('could not check raw content', this.pathFor(url), error);
    }
  }

  /**
   * URLs of every file saved so far, rebuilt from their paths (https assumed)
   */
  async listUrls(): Promise<string[]> {
    const files = await this.walk(this.config.rawDir);
    return files
      .filter((file) => !file.endsWith('.tmp'))
      .map((file) => {
        const relative = path.relative(this.config.rawDir, file).split(path.sep);
        const [host, ...rest] = relative;
        let urlPath = rest.join('/');
        if (urlPath === INDEX_FILE || urlPath.endsWith(`/${INDEX_FILE}`)) {
          urlPath = urlPath.slice(0, -INDEX_FILE.length);
        }
        return `https://${host}/${urlPath}`;
      })
      .sort();
  }

  private async walk(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new StorageError('could not list raw content', dir, error);
    }

    const files: string[] = [];
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(entryPath)));
      } else if (entry.isFile()) {
        files.push(entryPath);
      }
    }
    return files;
  }
}

function sanitizeSegment(segment: string): string {
  const safe = segment.replace(UNSAFE_CHARACTERS, '_');
  return safe === '.' || safe === '..' ? '_' : safe;
}
