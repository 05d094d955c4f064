import { assembleDataset } from '../../src/services/dataset-assembler';
import { normalizeSample } from '../../src/services/chunk-fetcher';
import { SampleRow } from '../../src/types';
import { samplesForDay } from '../mocks/monitoring-client.mock';

const rowsFor = (day: string): SampleRow[] => samplesForDay(day).map(normalizeSample);

describe('assembleDataset', () => {
  const a = rowsFor('2023-01-01');
  const b = rowsFor('2023-01-02');
  const c = rowsFor('2023-01-03');

  it('concatenates contributions in the order given', () => {
    const dataset = assembleDataset([a, b, c]);

    expect(dataset).toHaveLength(9);
    expect(dataset.map(row => row.date)).toEqual([
      '2023-01-01', '2023-01-01', '2023-01-01',
      '2023-01-02', '2023-01-02', '2023-01-02',
      '2023-01-03', '2023-01-03', '2023-01-03'
    ]);
  });

  it('is associative', () => {
    expect(assembleDataset([assembleDataset([a, b]), c])).toEqual(assembleDataset([a, b, c]));
    expect(assembleDataset([a, assembleDataset([b, c])])).toEqual(assembleDataset([a, b, c]));
  });

  it('skips empty contributions', () => {
    expect(assembleDataset([[], a, [], b])).toEqual(assembleDataset([a, b]));
  });

  it('returns an empty dataset when nothing contributed', () => {
    expect(assembleDataset([])).toEqual([]);
    expect(assembleDataset([[], []])).toEqual([]);
  });

  it('drops rows whose timestamp was already emitted', () => {
    const overlap = assembleDataset([a, [a[2], ...b]]);
    expect(overlap.map(row => row.timestamp)).toEqual([...a, ...b].map(row => row.timestamp));
  });

  it('returns a frozen dataset that does not share rows with its inputs', () => {
    const dataset = assembleDataset([a]);

    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(dataset[0])).toBe(true);
    a[0].value = 999;
    expect(dataset[0].value).toBe(100);
  });
});
