import * as fs from 'fs/promises';
import * as path from 'path';
import { logger as defaultLogger, Logger } from '../../utils/logger';

/**
 * Append-only record of redemption ids that were already counted.
 * One id per line; read in full on start-up.
 */
export class ProcessedEventLog {
  private readonly ids = new Set<string>();
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = defaultLogger
  ) {}

  async load(): Promise<number> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info(`📄 No processed-id file at ${this.filePath}, starting empty`);
        return 0;
      }
      throw error;
    }

    for (const line of content.split(/\r?\n/)) {
      const id = line.trim();
      if (id) {
        this.ids.add(id);
      }
    }
    this.logger.info(`📄 Loaded ${this.ids.size} processed redemption ids`);
    return this.ids.size;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  /**
   * Remember `id` and append it to the file before resolving.
   * Adding an id twice writes it once.
   */
  add(id: string): Promise<void> {
    if (this.ids.has(id)) {
      return this.writes;
    }
    this.ids.add(id);
    const write = this.writes.then(() => this.append(`${id}\n`));
    // A failed append must not poison later ones
    this.writes = write.catch(() => undefined);
    return write;
  }

  private async append(line: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, line, 'utf-8');
  }
}

export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
