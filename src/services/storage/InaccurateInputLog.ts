import * as fs from 'fs/promises';
import * as path from 'path';
import { errorMessage } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';

/**
 * Side record of typed titles that could not be turned into a game,
 * kept for the streamer to review by hand.
 */
export class InaccurateInputLog {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = defaultLogger
  ) {}

  static formatEntry(rawText: string, votes: number = 1): string {
    const title = rawText.replace(/\s+/g, ' ').trim() || '(empty)';
    return `${title} | votes: ${votes}\n`;
  }

  /** Never throws; a lost side record is only logged */
  async record(rawText: string, votes: number = 1): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, InaccurateInputLog.formatEntry(rawText, votes), 'utf-8');
      this.logger.info(`📝 Recorded inaccurate input: "${rawText.trim()}"`);
    } catch (error) {
      this.logger.warn(`Failed to record inaccurate input: ${errorMessage(error)}`);
    }
  }
}
