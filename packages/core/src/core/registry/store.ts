import { extname, isAbsolute } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { InvalidRegistryError, RegistryPathError } from '../../utils/errors.js';
import { isDirectory, readTextFileIfExists, writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { readRegistryDocument, SchemaError, type RegistryDocument } from './schema.js';

/**
 * Where a registry lives between operations.
 *
 * Each mutation loads nothing: the registry keeps the whole graph in memory
 * and hands the full document to `save` afterwards.
 */
export interface RegistryStore {
  /** Human readable location, for messages */
  readonly location: string;
  /** The stored document, or undefined when nothing was stored yet */
  load(): Promise<RegistryDocument | undefined>;
  save(document: RegistryDocument): Promise<void>;
}

/**
 * Registry persisted as one JSON file, overwritten on every save.
 */
export class JsonFileRegistryStore implements RegistryStore {
  constructor(readonly location: string) {}

  async load(): Promise<RegistryDocument | undefined> {
    const content = await readTextFileIfExists(this.location);
    if (content === undefined) {
      logger.debug(`No registry at ${this.location}, starting empty`);
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new InvalidRegistryError(`${this.location} is not valid JSON`, { path: this.location, error });
    }

    try {
      return readRegistryDocument(parsed);
    } catch (error) {
      if (error instanceof SchemaError) {
        throw new InvalidRegistryError(error.message, { path: this.location });
      }
      throw error;
    }
  }

  async save(document: RegistryDocument): Promise<void> {
    await this.assertWritableLocation();
    await writeJsonFile(this.location, document);
  }

  private async assertWritableLocation(): Promise<void> {
    if (!isAbsolute(this.location)) {
      throw new RegistryPathError('Registry path is not absolute', this.location);
    }
    if (await isDirectory(this.location)) {
      throw new RegistryPathError('Registry path does not point to a file', this.location);
    }
    if (extname(this.location) !== FILE_PATTERNS.JSON_EXTENSION) {
      throw new RegistryPathError('Registry path does not point to a JSON file', this.location);
    }
  }
}

/**
 * Registry held in memory only; stores a deep copy per save.
 */
export class MemoryRegistryStore implements RegistryStore {
  readonly location = '<memory>';
  private document: RegistryDocument | undefined;
  saveCount = 0;

  constructor(initial?: RegistryDocument) {
    this.document = initial ? structuredClone(initial) : undefined;
  }

  async load(): Promise<RegistryDocument | undefined> {
    return this.document ? structuredClone(this.document) : undefined;
  }

  async save(document: RegistryDocument): Promise<void> {
    this.document = structuredClone(document);
    this.saveCount++;
  }

  get snapshot(): RegistryDocument | undefined {
    return this.document ? structuredClone(this.document) : undefined;
  }
}
