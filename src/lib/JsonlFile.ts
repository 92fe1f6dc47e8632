import path from 'path';
import fsPromises from 'fs/promises';
import { FileSystem } from './FileSystem';

/**
 * Helper for JSONL files: reading and appending newline-delimited JSON entries.
 */
export class JsonlFile<T extends object = Record<string, unknown>> {
  constructor(private fs: FileSystem, private filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Reads and parses all JSON objects from the file. Returns an empty array if missing.
   */
  async read(): Promise<T[]> {
    const content = await this.fs.readFile(this.filePath);
    if (!content?.trim()) return [];
    try {
      return content.trim().split('\n').map((line): T => JSON.parse(line));
    } catch (err) {
      console.error(`Error reading or parsing JSONL file ${this.filePath}:`, err);
      throw new Error(`Failed to parse ${this.filePath}. Check its format.`);
    }
  }

  /**
   * Appends one entry, creating parent directories as needed.
   */
  async append(data: T): Promise<void> {
    const entry = JSON.stringify(data) + '\n';
    await this.fs.ensureDirExists(path.dirname(this.filePath));
    await fsPromises.appendFile(this.filePath, entry, 'utf-8');
  }
}
