import * as path from 'path';

import { Logger } from '@nestjs/common';

import { readJsonFile, writeJsonAtomic } from '../common/utils/json-file';

import { RecordCache } from './record-cache';

/**
 * A named collection of documents stored as one JSON object file: `{ [id]: document }`.
 * Documents are validated on load and served from a RecordCache afterwards.
 */
export class JsonCollection<T> {
  private readonly logger: Logger;
  private readonly cache = new RecordCache<T>();
  private readonly filePath: string;

  /** Serializes writes so concurrent updates land in order */
  private writeQueue: Promise<void> = Promise.resolve();

  /** Pending first read, shared by concurrent callers */
  private loading: Promise<void> | null = null;

  constructor(
    dataDir: string,
    readonly name: string,
    private readonly validate: (data: unknown, id: string) => T,
  ) {
    this.filePath = path.join(path.resolve(dataDir), `${name}.json`);
    this.logger = new Logger(`JsonCollection:${name}`);
  }

  async findOne(id: string): Promise<T | null> {
    await this.ensureLoaded();
    return this.cache.get(id);
  }

  async findAll(): Promise<T[]> {
    await this.ensureLoaded();
    return this.cache.values();
  }

  /**
   * Insert or replace the document stored under `id`.
   * The cache takes the document only once the file write succeeded.
   */
  async replaceOne(id: string, document: T): Promise<T> {
    const validated = this.validate(document, id);

    const write = this.writeQueue.then(async () => {
      await this.ensureLoaded();
      await writeJsonAtomic(this.filePath, { ...this.cache.toObject(), [id]: validated });
      this.cache.set(id, validated);
    });
    this.writeQueue = write.catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to write ${this.filePath}: ${message}`);
    });
    await write;

    this.logger.debug(`Saved ${this.name}/${id}`);
    return validated;
  }

  /** Drop cached documents; the next read goes back to disk */
  invalidate(): void {
    this.cache.invalidate();
    this.loading = null;
  }

  private async ensureLoaded(): Promise<void> {
    if (this.cache.isLoaded) {
      return;
    }
    this.loading ??= this.load().finally(() => {
      this.loading = null;
    });
    await this.loading;
  }

  private async load(): Promise<void> {
    const data = await readJsonFile(this.filePath);

    if (data === null) {
      this.logger.debug(`No ${this.name} file yet at ${this.filePath}`);
      this.cache.fill([]);
      return;
    }
    if (typeof data !== 'object' || Array.isArray(data)) {
      throw new Error(`Invalid ${this.name} file ${this.filePath}: expected an object of documents`);
    }

    const records = Object.entries(data).map(
      ([id, document]): [string, T] => [id, this.validate(document, id)],
    );
    this.cache.fill(records);
    this.logger.debug(`Loaded ${records.length} ${this.name} from ${this.filePath}`);
  }
}
