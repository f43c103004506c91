/**
 * Tests for PlaybookCurator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PersistenceError } from '@racelab/utils';
import { PlaybookCurator } from '../../src/playbook/playbook-curator.js';
import { playbookSnapshot } from '../helpers/records.js';

const source = (rows: number) => ({ toSnapshot: () => playbookSnapshot(rows) });

describe('PlaybookCurator', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'racelab-playbook-'));
    outputPath = join(dir, 'nested', 'playbook.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes history and latest, creating the directory', async () => {
    const curator = new PlaybookCurator({ outputPath });

    const path = await curator.save(source(1));
    const payload: unknown = JSON.parse(await fs.readFile(path, 'utf8'));

    expect(payload).toEqual({ history: [playbookSnapshot(1)], latest: playbookSnapshot(1) });
  });

  it('keeps only the newest maxHistory snapshots', async () => {
    const curator = new PlaybookCurator({ outputPath, maxHistory: 3 });

    for (const rows of [1, 2, 3, 4, 5]) {
      await curator.save(source(rows));
    }
    const history = await curator.loadHistory();

    expect(history.map((snapshot) => snapshot.metadata.experience_rows)).toEqual([3, 4, 5]);
    expect((await curator.loadLatest())?.metadata.experience_rows).toBe(5);
  });

  it('treats a missing file as an empty history', async () => {
    const curator = new PlaybookCurator({ outputPath });

    expect(await curator.loadHistory()).toEqual([]);
    expect(await curator.loadLatest()).toBeNull();
  });

  it('starts a new history over a corrupt file', async () => {
    await fs.mkdir(join(dir, 'nested'), { recursive: true });
    await fs.writeFile(outputPath, '{"history": [', 'utf8');
    const curator = new PlaybookCurator({ outputPath });

    expect(await curator.loadHistory()).toEqual([]);
    await curator.save(source(7));
    expect(await curator.loadHistory()).toHaveLength(1);
  });

  it('skips malformed snapshots and keeps valid ones', async () => {
    await fs.mkdir(join(dir, 'nested'), { recursive: true });
    await fs.writeFile(
      outputPath,
      JSON.stringify({ history: [playbookSnapshot(2), { metadata: 'broken' }] }),
      'utf8'
    );
    const curator = new PlaybookCurator({ outputPath });

    const history = await curator.loadHistory();

    expect(history).toEqual([playbookSnapshot(2)]);
  });

  it('leaves no temp file behind when the final rename fails', async () => {
    await fs.mkdir(join(outputPath, 'blocker'), { recursive: true });
    const curator = new PlaybookCurator({ outputPath });

    await expect(curator.save(source(1))).rejects.toThrow(PersistenceError);
    const entries = await fs.readdir(join(dir, 'nested'));
    expect(entries).toEqual(['playbook.json']);
    expect((await fs.stat(outputPath)).isDirectory()).toBe(true);
  });

  it('rejects a non-positive history cap', () => {
    expect(() => new PlaybookCurator({ outputPath, maxHistory: 0 })).toThrow(PersistenceError);
  });
});
