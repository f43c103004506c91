/**
 * Playbook Show Handler
 *
 * Returns one section of the latest curated playbook as table rows.
 */

import { NotFoundError } from '@racelab/utils';
import type { CommandContext } from '../../core/command-context.js';
import type { PlaybookShowArgs } from '../../command-defs/ace.js';

export type PlaybookRow = Record<string, string | number | boolean | null>;

export async function showPlaybookHandler(
  args: PlaybookShowArgs,
  ctx: CommandContext
): Promise<PlaybookRow[]> {
  const curator = ctx.playbookCurator(args.playbookPath);
  const latest = await curator.loadLatest();
  if (latest === null) {
    throw new NotFoundError('Playbook', curator.outputPath);
  }

  switch (args.section) {
    case 'strategies':
      return latest.strategies.map((stat) => ({
        strategy_id: stat.strategy_id,
        bets: stat.bets,
        wins: stat.wins,
        hit_rate: stat.hit_rate,
        roi_pct: stat.roi_pct,
        p_value: stat.p_value,
        significant: stat.significant,
      }));
    case 'tracks':
      return latest.tracks.map((insight) => ({ ...insight }));
    case 'contexts':
      return latest.contexts.map((insight) => ({
        track: insight.track ?? null,
        distance_band: insight.distance_band ?? null,
        racing_type: insight.racing_type ?? null,
        race_type: insight.race_type ?? null,
        bets: insight.bets,
        profit: insight.profit,
        pot_pct: insight.pot_pct,
      }));
    case 'global':
      return [{ ...latest.global }];
    case 'metadata':
      return [{ ...latest.metadata }];
  }
}
