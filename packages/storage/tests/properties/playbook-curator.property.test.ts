/**
 * Property Tests for PlaybookCurator history cap
 */

import { describe, it } from 'vitest';
import fc from 'fast-check';
import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PlaybookCurator } from '../../src/playbook/playbook-curator.js';
import { playbookSnapshot } from '../helpers/records.js';

describe('PlaybookCurator - Property Tests', () => {
  it('history never exceeds the cap and ends with the latest save', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 4 }), fc.integer({ min: 1, max: 7 }), async (cap, saves) => {
        const dir = await fs.mkdtemp(join(tmpdir(), 'racelab-cap-'));
        try {
          const curator = new PlaybookCurator({ outputPath: join(dir, 'playbook.json'), maxHistory: cap });
          for (let i = 1; i <= saves; i++) {
            await curator.save({ toSnapshot: () => playbookSnapshot(i) });
          }
          const history = await curator.loadHistory();
          const last = history[history.length - 1];
          return (
            history.length === Math.min(cap, saves) && last?.metadata.experience_rows === saves
          );
        } finally {
          await fs.rm(dir, { recursive: true, force: true });
        }
      }),
      { numRuns: 25 }
    );
  });
});
