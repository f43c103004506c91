import {
  createRunnerTable,
  type ExperienceRecord,
  type ExperienceSink,
  type RunnerTable,
  type WrittenExperiences,
} from '@racelab/core';

/**
 * One race, three runners. At margin 1.05 the edges are
 * 1.1905 (runner 1), 0.5952 (runner 2) and 2.4762 (runner 3).
 */
export function scenarioTable(): RunnerTable {
  return createRunnerTable([
    {
      event_date: '2024-03-02T00:00:00',
      race_id: 'R1',
      runner_id: 'R1_1',
      selection_id: 101,
      model_prob: 0.25,
      win_odds: 5.0,
      win_result: 'WINNER',
      track: 'Flemington',
    },
    {
      event_date: '2024-03-02T00:00:00',
      race_id: 'R1',
      runner_id: 'R1_2',
      selection_id: 102,
      model_prob: 0.5,
      win_odds: 2.5,
      win_result: 'LOSER',
      track: 'Flemington',
    },
    {
      event_date: '2024-03-02T00:00:00',
      race_id: 'R1',
      runner_id: 'R1_3',
      selection_id: 103,
      model_prob: 0.1,
      win_odds: 12.0,
      win_result: 'LOSER',
      track: 'Flemington',
    },
  ]);
}

export class MemoryExperienceSink implements ExperienceSink {
  readonly writes: { records: readonly ExperienceRecord[]; label: string | undefined }[] = [];

  async write(records: readonly ExperienceRecord[], label?: string): Promise<WrittenExperiences> {
    this.writes.push({ records, label });
    return { path: `memory/${label ?? 'experiences'}.parquet`, format: 'parquet', rows: records.length };
  }
}
