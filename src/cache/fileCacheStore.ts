import { constants, promises as fs } from 'node:fs';
import path from 'node:path';
import { CacheReadError, ConfigurationError } from '../errors';
import { isRecord } from '../utils/guards';
import type { CacheStore } from './cacheStore';

type CacheDocument = Record<string, string>;

/**
 * Keeps all entries in one JSON document inside an existing directory.
 * Writes go to a temp file that is renamed over the document, so readers
 * never observe a partial write. Concurrent writers: last one wins.
 */
export class FileCacheStore implements CacheStore {
  private constructor(readonly filePath: string) {}

  static async open(cacheDir: string, cacheFile: string): Promise<FileCacheStore> {
    const dir = path.resolve(cacheDir);

    try {
      const stats = await fs.stat(dir);
      if (!stats.isDirectory()) {
        throw new ConfigurationError(`Cache directory [${dir}] is not a directory`);
      }
      await fs.access(dir, constants.W_OK);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      throw new ConfigurationError(`Cache directory [${dir}] does not exist or is not writable`, { cause: error });
    }

    return new FileCacheStore(path.join(dir, cacheFile));
  }

  async get(key: string): Promise<string | undefined> {
    const document = await this.readDocument();
    return document[key];
  }

  async put(key: string, value: string): Promise<void> {
    let document: CacheDocument;
    try {
      document = await this.readDocument();
    } catch (error) {
      if (!(error instanceof CacheReadError)) throw error;
      // Corrupt document: start over
      document = {};
    }

    document[key] = value;

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmpPath, JSON.stringify(document, null, 2), 'utf8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
  }

  private async readDocument(): Promise<CacheDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CacheReadError(this.filePath, `Cache file [${this.filePath}] is not valid JSON`, { cause: error });
    }

    if (!isRecord(parsed)) {
      throw new CacheReadError(this.filePath, `Cache file [${this.filePath}] is not a JSON object`);
    }

    const document: CacheDocument = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        document[key] = value;
      }
    }
    return document;
  }
}
