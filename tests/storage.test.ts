import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InaccurateInputLog } from '../src/services/storage/InaccurateInputLog';
import { ProcessedEventLog } from '../src/services/storage/ProcessedEventLog';
import { silentLogger } from './helpers/fakes';

describe('ProcessedEventLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'vote-ids-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist yet', async () => {
    const log = new ProcessedEventLog(path.join(dir, 'missing.txt'), silentLogger);
    expect(await log.load()).toBe(0);
    expect(log.has('r1')).toBe(false);
  });

  it('appends each id once and survives a reload', async () => {
    const file = path.join(dir, 'nested', 'ids.txt');
    const log = new ProcessedEventLog(file, silentLogger);
    await log.load();

    await log.add('r1');
    await log.add('r2');
    await log.add('r1');

    expect(await readFile(file, 'utf-8')).toBe('r1\nr2\n');

    const reloaded = new ProcessedEventLog(file, silentLogger);
    expect(await reloaded.load()).toBe(2);
    expect(reloaded.has('r2')).toBe(true);
  });

  it('ignores blank lines and surrounding whitespace', async () => {
    const file = path.join(dir, 'ids.txt');
    await writeFile(file, 'r1\r\n\n  r2  \n', 'utf-8');

    const log = new ProcessedEventLog(file, silentLogger);
    expect(await log.load()).toBe(2);
    expect(log.has('r2')).toBe(true);
  });
});

describe('InaccurateInputLog', () => {
  it('formats one line per title', () => {
    expect(InaccurateInputLog.formatEntry('  Half   Life ')).toBe('Half Life | votes: 1\n');
    expect(InaccurateInputLog.formatEntry('   ')).toBe('(empty) | votes: 1\n');
  });

  it('appends entries to the file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'inaccurate-'));
    try {
      const file = path.join(dir, 'inaccurate.txt');
      const log = new InaccurateInputLog(file, silentLogger);
      await log.record('Hlaf Life');
      await log.record('');
      expect(await readFile(file, 'utf-8')).toBe('Hlaf Life | votes: 1\n(empty) | votes: 1\n');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
