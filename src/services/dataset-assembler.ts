import { Dataset, SampleRow } from '../types';

/**
 * Concatenate row batches in the order given. Empty batches are skipped and a
 * timestamp already emitted is not emitted again. The result is frozen so the
 * presentation layer cannot mutate a cached dataset.
 */
export function assembleDataset(contributions: ReadonlyArray<ReadonlyArray<SampleRow>>): Dataset {
  const seen = new Set<string>();
  const rows: SampleRow[] = [];

  for (const batch of contributions) {
    for (const row of batch) {
      if (seen.has(row.timestamp)) continue;
      seen.add(row.timestamp);
      rows.push(Object.freeze({ ...row }));
    }
  }

  return Object.freeze(rows);
}
