/**
 * Codec for the mirror's interchange table: a `Votes | Game` header row
 * followed by one `[tally, name]` row per game.
 */

import type { MirrorCell, MirrorRow, RankedGame } from '../../types';
import { MirrorSchemaError } from '../../utils/errors';

export const MIRROR_HEADER = ['Votes', 'Game'] as const;

export interface ParsedMirror {
  rows: MirrorRow[];
  skippedBlank: number;
  skippedMalformed: number;
}

function isBlank(cell: unknown): boolean {
  return cell === undefined || cell === null || (typeof cell === 'string' && cell.trim() === '');
}

function cellText(cell: unknown): string {
  if (typeof cell === 'string') return cell.trim();
  if (typeof cell === 'number' || typeof cell === 'boolean') return String(cell);
  return '';
}

/** Non-negative whole numbers only; anything else is malformed */
export function parseTally(cell: unknown): number | null {
  if (typeof cell === 'number') {
    return Number.isInteger(cell) && cell >= 0 ? cell : null;
  }
  if (typeof cell === 'string' && /^\d+$/.test(cell.trim())) {
    const value = Number(cell.trim());
    return Number.isSafeInteger(value) ? value : null;
  }
  return null;
}

function assertHeader(header: unknown[]): void {
  let width = header.length;
  while (width > 0 && isBlank(header[width - 1])) {
    width--;
  }
  if (width > MIRROR_HEADER.length) {
    throw new MirrorSchemaError(`expected ${MIRROR_HEADER.length} columns, found ${width}`);
  }
  MIRROR_HEADER.forEach((expected, column) => {
    const actual = cellText(header[column]);
    if (actual.toLowerCase() !== expected.toLowerCase()) {
      throw new MirrorSchemaError(`column ${column + 1} should be "${expected}", found "${actual}"`);
    }
  });
}

/**
 * Decode raw sheet values. An entirely empty sheet decodes to no rows;
 * a wrong header raises `MirrorSchemaError`.
 */
export function parseMirrorValues(values: unknown[][]): ParsedMirror {
  const parsed: ParsedMirror = { rows: [], skippedBlank: 0, skippedMalformed: 0 };
  if (values.length === 0 || values.every(row => row.every(isBlank))) {
    return parsed;
  }

  const [header, ...data] = values;
  assertHeader(header);

  for (const row of data) {
    const [tallyCell, nameCell] = row;
    const name = cellText(nameCell);
    if (name === '') {
      parsed.skippedBlank++;
      continue;
    }
    const tally = parseTally(tallyCell);
    if (tally === null) {
      parsed.skippedMalformed++;
      continue;
    }
    parsed.rows.push({ name, tally });
  }

  return parsed;
}

export function toMirrorValues(games: RankedGame[]): MirrorCell[][] {
  return [[...MIRROR_HEADER], ...games.map(game => [game.tally, game.name])];
}
