/**
 * Playbook
 *
 * Curated summary of one reflection pass. Serialized under the keys the
 * serving component reads: metadata, global, strategies, tracks, contexts.
 */

import type {
  ContextInsight,
  GlobalStats,
  PlaybookMetadata,
  PlaybookSnapshot,
  StrategyStat,
  TrackInsight,
} from '@racelab/core';

export class Playbook {
  constructor(
    readonly metadata: PlaybookMetadata,
    readonly globalStats: GlobalStats,
    readonly strategyStats: readonly StrategyStat[],
    readonly trackInsights: readonly TrackInsight[],
    readonly contextInsights: readonly ContextInsight[] = []
  ) {}

  toSnapshot(): PlaybookSnapshot {
    return {
      metadata: { ...this.metadata },
      global: { ...this.globalStats },
      strategies: this.strategyStats.map((stat) => ({ ...stat })),
      tracks: this.trackInsights.map((insight) => ({ ...insight })),
      contexts: this.contextInsights.map((insight) => ({ ...insight })),
    };
  }
}
