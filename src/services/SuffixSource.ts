import { readFile } from 'fs/promises';
import { ConfigError } from '../errors';

/**
 * Where a suffix configuration document comes from.
 * Sources are read fresh on every operation.
 */
export interface ISuffixSource {
  /**
   * Read and parse the raw configuration document
   * @throws ConfigError when the document is missing or not valid JSON
   */
  read(): Promise<unknown>;

  /**
   * Human-readable location used in error messages and logs
   */
  describe(): string;
}

/**
 * Suffix configuration stored as a JSON file on disk
 */
export class JsonFileSuffixSource implements ISuffixSource {
  constructor(private readonly filePath: string) {}

  async read(): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ConfigError(`Suffix configuration file not found: ${this.filePath}`, { cause: error });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read suffix configuration ${this.filePath}: ${reason}`, { cause: error });
    }

    // Editors on Windows like to prepend a byte-order mark
    const content = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new ConfigError(`Suffix configuration is not valid JSON: ${this.filePath}`, { cause: error });
    }
  }

  describe(): string {
    return this.filePath;
  }
}

/**
 * Suffix configuration held in memory, already parsed
 */
export class InMemorySuffixSource implements ISuffixSource {
  constructor(private readonly document: unknown) {}

  async read(): Promise<unknown> {
    return this.document;
  }

  describe(): string {
    return '<in-memory>';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
