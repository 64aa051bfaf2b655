import { describe, it, expect } from 'vitest';
import { RankingMetric } from './ranking-metric.js';
import { identityGain } from '../metrics/gain-discount.js';
import { PADDING_LABEL, type RankingList } from '../types/ranking.js';
import type { MetricOptions } from '../types/metric.js';

function metric(options: MetricOptions): RankingMetric {
  return RankingMetric.create(options)._unsafeUnwrap();
}

const sortedList: RankingList = { labels: [3, 2, 0], scores: [0.9, 0.7, 0.5] };
const lateHit: RankingList = { labels: [0, 1, 0], scores: [0.9, 0.1, 0.5] };

describe('RankingMetric', () => {
  describe('create', () => {
    it('should name a metric after its key and cutoff', () => {
      expect(metric({ key: 'ndcg', topn: 5 }).name).toBe('ndcg_5');
      expect(metric({ key: 'mrr' }).name).toBe('mrr');
      expect(metric({ key: 'mrr', name: 'metric/mrr' }).name).toBe('metric/mrr');
    });

    it('should reject an unknown key', () => {
      const result = RankingMetric.create({ key: 'hit_rate' });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Unsupported metric: hit_rate');
      }
    });

    it('should reject a cutoff on whole-list metrics', () => {
      const result = RankingMetric.create({ key: 'arp', topn: 3 });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Metric arp scores the whole list and takes no topn');
      }
    });

    it('should reject gain functions on metrics that have no gain', () => {
      const result = RankingMetric.create({ key: 'mrr', gainFn: identityGain });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Metric mrr does not use gain or discount functions');
      }
    });

    it('should reject a non-positive cutoff', () => {
      expect(RankingMetric.create({ key: 'precision', topn: 0 }).isErr()).toBe(true);
    });
  });

  describe('update', () => {
    it('should compute DCG of an already sorted list', () => {
      const dcg = metric({ key: 'dcg', topn: 3 });
      dcg.update([sortedList]);
      expect(dcg.result()).toBeCloseTo(8.893, 3);
    });

    it('should compute NDCG of 1.0 for an ideal order', () => {
      const ndcg = metric({ key: 'ndcg', topn: 3 });
      ndcg.update([sortedList]);
      expect(ndcg.result()).toBeCloseTo(1, 10);
    });

    it('should rank by score before finding the first relevant item', () => {
      const mrr = metric({ key: 'mrr' });
      mrr.update([lateHit]);
      expect(mrr.result()).toBeCloseTo(1 / 3, 10);
    });

    it('should give no credit when the first hit falls beyond the cutoff', () => {
      const mrr = metric({ key: 'mrr', topn: 2 });
      mrr.update([lateHit]);
      expect(mrr.result()).toBe(0);
      expect(mrr.totals.totalWeight).toBe(1);
    });

    it('should use a custom gain function', () => {
      // gains [3, 2, 0]: list weight (3 + 2) / 5 = 1
      const dcg = metric({ key: 'dcg', gainFn: identityGain });
      dcg.update([sortedList]);
      expect(dcg.result()).toBeCloseTo(3 + 2 * (Math.LN2 / Math.log(3)), 10);
    });

    it('should score a list whose labels are all equal', () => {
      const precision = metric({ key: 'precision' });
      precision.update([{ labels: [2, 2, 2], scores: [0.3, 0.2, 0.1] }]);
      expect(precision.result()).toBe(1);

      const opa = metric({ key: 'ordered_pair_accuracy' });
      opa.update([{ labels: [2, 2, 2], scores: [0.3, 0.2, 0.1] }]);
      expect(opa.totals.totalWeight).toBe(0);
      expect(opa.result()).toBe(0);
    });

    it('should ignore padded items wherever they score', () => {
      const mrr = metric({ key: 'mrr' });
      mrr.update([{ labels: [PADDING_LABEL, 1, 0], scores: [0.99, 0.5, 0.1] }]);
      expect(mrr.result()).toBe(1);
    });

    it('should leave the running mean untouched by degenerate lists', () => {
      const mrr = metric({ key: 'mrr' });
      mrr.update([{ labels: [1, 0], scores: [0.9, 0.1] }]);
      mrr.update([{ labels: [1], scores: [0.2] }, { labels: [0, 0], scores: [0.2, 0.1] }]);
      expect(mrr.totals).toEqual({ totalWeightedValue: 1, totalWeight: 1 });
    });

    it('should return the mean of the batch alone', () => {
      const mrr = metric({ key: 'mrr' });
      expect(mrr.update([{ labels: [1, 0], scores: [0.9, 0.1] }])._unsafeUnwrap()).toBe(1);
      expect(mrr.update([{ labels: [0, 1], scores: [0.9, 0.1] }])._unsafeUnwrap()).toBe(0.5);
      expect(mrr.result()).toBe(0.75);
    });

    it('should leave the running mean untouched when a batch is rejected', () => {
      const mrr = metric({ key: 'mrr' });
      mrr.update([{ labels: [1, 0], scores: [0.9, 0.1] }]);
      const before = mrr.totals;

      const result = mrr.update([
        { labels: [0, 1], scores: [0.9, 0.1] },
        { labels: [1, 0], scores: [0.9] },
      ]);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.kind).toBe('shape_mismatch');
      }
      expect(mrr.totals).toEqual(before);
    });

    it('should scale lists by a per-list sample weight', () => {
      const mrr = metric({ key: 'mrr' });
      mrr.update(
        [
          { labels: [1, 0], scores: [0.9, 0.1] },
          { labels: [0, 1], scores: [0.9, 0.1] },
        ],
        [2, 1],
      );
      // (2 * 1 + 1 * 0.5) / 3
      expect(mrr.result()).toBeCloseTo(0.8333, 4);
    });

    it('should fold a per-item sample weight into item weights', () => {
      const precision = metric({ key: 'precision' });
      precision.update([{ labels: [1, 0], scores: [0.9, 0.1] }], [[3, 1]]);
      expect(precision.result()).toBe(0.75);
      expect(precision.totals).toEqual({ totalWeightedValue: 2.25, totalWeight: 3 });
    });

    it('should require subtopics for diversity metrics', () => {
      const alphaDcg = metric({ key: 'alpha_dcg' });
      const result = alphaDcg.update([sortedList]);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.kind).toBe('missing_field');
        expect(result.error.message).toBe('List 0: metric alpha_dcg needs subtopics');
      }
    });
  });

  describe('tie-breaking', () => {
    const tied: RankingList = { labels: [0, 0, 0, 0, 1, 0], scores: [0.5, 0.5, 0.5, 0.5, 0.5, 0.5] };

    it('should break ties by input order without a seed', () => {
      const mrr = metric({ key: 'mrr' });
      mrr.update([tied]);
      expect(mrr.result()).toBeCloseTo(1 / 5, 10);
    });

    it('should give the same result for the same seed', () => {
      const a = metric({ key: 'mrr', seed: 42 });
      const b = metric({ key: 'mrr', seed: 42 });
      a.update([tied, tied]);
      b.update([tied, tied]);
      expect(a.totals).toEqual(b.totals);
    });

    it('should replay the same tie-breaks after reset', () => {
      const mrr = metric({ key: 'mrr', seed: 7 });
      const first = mrr.update([tied, tied])._unsafeUnwrap();
      mrr.reset();
      const second = mrr.update([tied, tied])._unsafeUnwrap();
      expect(second).toBe(first);
    });
  });

  describe('scoreLists', () => {
    it('should return per-list scores without updating the mean', () => {
      const mrr = metric({ key: 'mrr' });
      const scores = mrr.scoreLists([lateHit, { labels: [1], scores: [0.5] }])._unsafeUnwrap();

      expect(scores[0]?.value).toBeCloseTo(1 / 3, 10);
      expect(scores[0]?.weight).toBe(1);
      expect(scores[1]).toEqual({ value: 0, weight: 0 });
      expect(mrr.totals).toEqual({ totalWeightedValue: 0, totalWeight: 0 });
    });
  });

  describe('reset / merge', () => {
    it('should return 0 after reset', () => {
      const mrr = metric({ key: 'mrr' });
      mrr.update([{ labels: [1, 0], scores: [0.9, 0.1] }]);
      mrr.reset();
      expect(mrr.result()).toBe(0);
    });

    it('should combine totals of two shards', () => {
      const a = metric({ key: 'mrr' });
      const b = metric({ key: 'mrr' });
      a.update([{ labels: [1, 0], scores: [0.9, 0.1] }]);
      b.update([{ labels: [0, 1], scores: [0.9, 0.1] }]);
      a.merge(b.totals);
      expect(a.result()).toBe(0.75);
    });
  });

  describe('getConfig / fromConfig', () => {
    it('should produce a plain record without defaults that were not set', () => {
      expect(metric({ key: 'ndcg', topn: 5, seed: 7 }).getConfig()).toEqual({
        key: 'ndcg',
        name: 'ndcg_5',
        topn: 5,
        seed: 7,
      });
    });

    it('should record alpha for alpha_dcg', () => {
      expect(metric({ key: 'alpha_dcg' }).getConfig()).toEqual({
        key: 'alpha_dcg',
        name: 'alpha_dcg',
        alpha: 0.5,
      });
    });

    it('should rebuild an equivalent metric from its record', () => {
      const original = metric({ key: 'precision', topn: 2, name: 'p@2' });
      const restored = RankingMetric.fromConfig(original.getConfig())._unsafeUnwrap();

      expect(restored.getConfig()).toEqual(original.getConfig());

      const batch = [lateHit, sortedList];
      original.update(batch);
      restored.update(batch);
      expect(restored.result()).toBe(original.result());
    });

    it('should reject a record that is not an object', () => {
      const result = RankingMetric.fromConfig('ndcg');

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Metric config must be an object');
      }
    });
  });
});
