import type { sheets_v4 } from 'googleapis';
import type { MirrorCell } from '../../types';
import type { VoteMirror } from '../../types/interfaces';
import { toExternalServiceError } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';

const SERVICE = 'Google Sheets';

/** `My Sheet` -> `'My Sheet'`, with embedded quotes doubled */
export function quoteSheetName(sheetName: string): string {
  return `'${sheetName.replace(/'/g, "''")}'`;
}

/**
 * Worksheet mirror backed by the Sheets v4 values API.
 * Only columns A:B are ever read or written.
 */
export class GoogleSheetsMirror implements VoteMirror {
  private readonly sheetRef: string;

  constructor(
    private readonly sheets: sheets_v4.Sheets,
    public readonly id: string,
    sheetName: string,
    private readonly logger: Logger = defaultLogger
  ) {
    this.sheetRef = quoteSheetName(sheetName);
  }

  async readValues(): Promise<unknown[][]> {
    try {
      const response = await this.sheets.spreadsheets.values.get({
        spreadsheetId: this.id,
        range: `${this.sheetRef}!A:B`,
        valueRenderOption: 'UNFORMATTED_VALUE'
      });
      return response.data.values ?? [];
    } catch (error) {
      throw toExternalServiceError(SERVICE, error);
    }
  }

  /**
   * Overwrite rows 1..n, then clear everything below so rows left over from
   * a longer table do not linger.
   */
  async writeValues(values: MirrorCell[][]): Promise<void> {
    const rowCount = values.length;
    try {
      await this.sheets.spreadsheets.values.update({
        spreadsheetId: this.id,
        range: `${this.sheetRef}!A1:B${rowCount}`,
        valueInputOption: 'RAW',
        requestBody: { values }
      });
      await this.sheets.spreadsheets.values.clear({
        spreadsheetId: this.id,
        range: `${this.sheetRef}!A${rowCount + 1}:B`
      });
      this.logger.debug(`📊 Mirror updated with ${rowCount - 1} rows`);
    } catch (error) {
      throw toExternalServiceError(SERVICE, error);
    }
  }
}
