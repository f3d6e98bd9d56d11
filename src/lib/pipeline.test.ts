import { describe, it, expect } from 'vitest';
import { enrichRecord, enrichRecords, sortByDateDesc } from './pipeline.js';
import { rewriteSchema } from './schema.js';
import type { PollRecord } from '../../types/index.js';

const COLUMNS = rewriteSchema(['Dates', 'Pollster', 'Approve', 'Disapprove', 'Influence']);

describe('Row pipeline', () => {
  describe('enrichRecord', () => {
    it('should canonicalize dates and split pollster from sponsor', () => {
      const row = enrichRecord(
        {
          Dates: 'Poll@12345',
          Pollster: "<a href='x'>Quinnipiac</a>^Sponsor: ABC^",
          Approve: '45',
          Disapprove: '50',
          Influence: '2',
        },
        COLUMNS
      );

      expect(row).toEqual({
        Dates: '1993-10-19',
        Pollster: 'Quinnipiac',
        Sponsor: 'ABC',
        Approve: '45',
        Disapprove: '50',
        Influence: '2',
        RollingWeightedApprove: '',
      });
    });

    it('should default missing schema columns to empty strings', () => {
      const row = enrichRecord({ Approve: '40' }, COLUMNS);

      expect(row).toEqual({
        Approve: '40',
        Dates: '',
        Pollster: '',
        Sponsor: '',
        Influence: '',
        RollingWeightedApprove: '',
      });
    });

    it('should keep absent cells from short rows null', () => {
      const row = enrichRecord({ Dates: null, Pollster: null, Approve: null }, COLUMNS);

      expect(row.Dates).toBeNull();
      expect(row.Pollster).toBe('');
      expect(row.Sponsor).toBe('');
      expect(row.Approve).toBeNull();
    });

    it('should not modify the source record', () => {
      const raw: PollRecord = { Dates: '03/04/2021', Pollster: 'Gallup^Sponsor: CNN^' };
      enrichRecord(raw, COLUMNS);
      expect(raw).toEqual({ Dates: '03/04/2021', Pollster: 'Gallup^Sponsor: CNN^' });
    });
  });

  describe('enrichRecords', () => {
    it('should produce one row per record', () => {
      expect(enrichRecords([{}, {}, {}], COLUMNS)).toHaveLength(3);
      expect(enrichRecords([], COLUMNS)).toEqual([]);
    });
  });

  describe('sortByDateDesc', () => {
    it('should order newest first with undated rows last in input order', () => {
      const rows: PollRecord[] = [
        { id: 'a', Dates: '2021-01-01' },
        { id: 'b', Dates: 'junk' },
        { id: 'c', Dates: '2023-05-05' },
        { id: 'd', Dates: '' },
        { id: 'e', Dates: '2021-01-01' },
        { id: 'f' },
        { id: 'g', Dates: '2022-12-31' },
      ];

      expect(sortByDateDesc(rows).map(r => r.id)).toEqual(['c', 'g', 'a', 'e', 'b', 'd', 'f']);
    });
  });
});
