/**
 * Tests for runner table and strategy definition loaders
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError, NotFoundError, ValidationError } from '@racelab/utils';
import { loadRunnerTable } from '../../src/runners/runner-table-loader.js';
import { loadStrategyDefinitions } from '../../src/strategies/strategy-definition-loader.js';
import { writeFileAtomic } from '../../src/fs/atomic-write.js';

const RUNNERS_CSV = [
  'event_date,race_id,runner_id,model_prob,win_odds,win_result,track',
  '2024-03-01,R2,R2_1,0.3,5,LOSER,Randwick',
  '2024-03-01,R1,R1_1,0.2,6,WINNER,Flemington',
  '2024-03-02,R3,R3_1,0.25,4,,Caulfield',
  '',
].join('\n');

let dir: string;

beforeAll(async () => {
  dir = await fs.mkdtemp(join(tmpdir(), 'racelab-inputs-'));
  await fs.writeFile(join(dir, 'runners.csv'), RUNNERS_CSV, 'utf8');
});

afterAll(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('loadRunnerTable', () => {
  it('reads every CSV row with header columns and blank cells as null', async () => {
    const table = await loadRunnerTable(join(dir, 'runners.csv'));

    expect(table.columns).toEqual([
      'event_date',
      'race_id',
      'runner_id',
      'model_prob',
      'win_odds',
      'win_result',
      'track',
    ]);
    expect(table.rows).toHaveLength(3);
    expect(table.rows[2]).toEqual({
      event_date: '2024-03-02',
      race_id: 'R3',
      runner_id: 'R3_1',
      model_prob: '0.25',
      win_odds: '4',
      win_result: null,
      track: 'Caulfield',
    });
  });

  it('applies an inclusive date window', async () => {
    const table = await loadRunnerTable(join(dir, 'runners.csv'), {
      from: '2024-03-02',
      to: '2024-03-02',
    });

    expect(table.rows.map((row) => row['race_id'])).toEqual(['R3']);
  });

  it('reports an empty window as not found', async () => {
    await expect(
      loadRunnerTable(join(dir, 'runners.csv'), { from: '2025-01-01', to: '2025-01-31' })
    ).rejects.toThrow(NotFoundError);
  });

  it('caps at the first races in date and race order', async () => {
    const table = await loadRunnerTable(join(dir, 'runners.csv'), { maxRaces: 2 });

    expect(table.rows.map((row) => row['race_id'])).toEqual(['R1', 'R2']);
  });

  it('reads a JSON array of runners', async () => {
    const path = join(dir, 'runners.json');
    await fs.writeFile(
      path,
      JSON.stringify([{ race_id: 'R1', model_prob: 0.4, win_odds: 3.5, win_result: 'WINNER' }]),
      'utf8'
    );

    const table = await loadRunnerTable(path);

    expect(table.rows).toEqual([
      { race_id: 'R1', model_prob: 0.4, win_odds: 3.5, win_result: 'WINNER' },
    ]);
  });

  it('rejects JSON that is not a list of objects', async () => {
    const path = join(dir, 'object.json');
    await fs.writeFile(path, JSON.stringify({ race_id: 'R1' }), 'utf8');

    await expect(loadRunnerTable(path)).rejects.toThrow(ValidationError);
  });

  it('reports a missing file as not found', async () => {
    await expect(loadRunnerTable(join(dir, 'absent.csv'))).rejects.toThrow(NotFoundError);
  });
});

describe('loadStrategyDefinitions', () => {
  it('wraps a single mapping in a list', async () => {
    const path = join(dir, 'single.json');
    await fs.writeFile(path, JSON.stringify({ margins: [1.05] }), 'utf8');

    expect(await loadStrategyDefinitions(path)).toEqual([{ margins: [1.05] }]);
  });

  it('returns a list of mappings as given', async () => {
    const path = join(dir, 'list.json');
    await fs.writeFile(path, JSON.stringify([{ margins: [1.02] }, { top_ns: [2] }]), 'utf8');

    expect(await loadStrategyDefinitions(path)).toEqual([{ margins: [1.02] }, { top_ns: [2] }]);
  });

  it('rejects anything else', async () => {
    const path = join(dir, 'number.json');
    await fs.writeFile(path, '42', 'utf8');

    await expect(loadStrategyDefinitions(path)).rejects.toThrow(ConfigurationError);
  });

  it('rejects invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    await fs.writeFile(path, '{ margins: ', 'utf8');

    await expect(loadStrategyDefinitions(path)).rejects.toThrow('is not valid JSON');
  });

  it('reports a missing file as not found', async () => {
    await expect(loadStrategyDefinitions(join(dir, 'absent.json'))).rejects.toThrow(
      NotFoundError
    );
  });
});

describe('writeFileAtomic', () => {
  it('replaces the target and leaves no temp file', async () => {
    const target = join(dir, 'atomic', 'out.json');

    await writeFileAtomic(target, 'first', { tempPrefix: '.out_' });
    await writeFileAtomic(target, 'second', { tempPrefix: '.out_' });

    expect(await fs.readFile(target, 'utf8')).toBe('second');
    expect(await fs.readdir(join(dir, 'atomic'))).toEqual(['out.json']);
  });
});
