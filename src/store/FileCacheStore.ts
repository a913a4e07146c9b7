import crypto from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { IOError } from '../errors';
import { Logger } from '../logging/Logger';
import { CacheRecord, fromCacheFile, isExpired, toCacheFile } from './CacheRecord';
import { ICacheStore } from './CacheStore';

export class FileCacheStore implements ICacheStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  public async load(): Promise<CacheRecord | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.info(`No cache file at ${this.filePath}, will create one after the next provider check`);
      } else {
        this.logger.warn(`Failed to read cache file ${this.filePath}, treating as absent`, error);
      }
      return undefined;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      this.logger.warn(`Cache file ${this.filePath} is not valid JSON, treating as absent`, error);
      return undefined;
    }

    const record = fromCacheFile(data);
    if (!record) {
      this.logger.warn(`Cache file ${this.filePath} has an unexpected shape, treating as absent`);
      return undefined;
    }

    this.logger.debug(`Loaded cache from ${this.filePath}`);
    return record;
  }

  public async save(record: CacheRecord): Promise<void> {
    const content = `${JSON.stringify(toCacheFile(record), null, 2)}\n`;
    const directory = path.dirname(this.filePath);
    const tempPath = path.join(
      directory,
      `.${path.basename(this.filePath)}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`
    );

    try {
      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(tempPath, content, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug(`Could not remove temporary cache file ${tempPath}`, cleanupError);
      });
      const reason = error instanceof Error ? error.message : String(error);
      throw new IOError(`Failed to write cache file ${this.filePath}: ${reason}`, { cause: error });
    }

    this.logger.debug(`Cache saved to ${this.filePath}`);
  }

  public isExpired(record: CacheRecord, now: Date, expiryMs: number): boolean {
    return isExpired(record, now, expiryMs);
  }
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;
