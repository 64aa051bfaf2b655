import { describe, it, expect } from 'vitest';
import { MetricSuite } from './metric-suite.js';
import { RankingMetric } from './ranking-metric.js';

const batch = [
  { labels: [1, 0], scores: [0.9, 0.1] },
  { labels: [0, 1], scores: [0.9, 0.1] },
];

function suite(): MetricSuite {
  return MetricSuite.fromConfigs([
    { key: 'mrr' },
    { key: 'precision', topn: 1 },
  ])._unsafeUnwrap();
}

describe('MetricSuite', () => {
  it('should list metric names in order', () => {
    expect(suite().names).toEqual(['mrr', 'precision_1']);
  });

  it('should update every metric and report batch values', () => {
    const metrics = suite();
    const values = metrics.update(batch)._unsafeUnwrap();

    expect(values).toEqual({ mrr: 0.75, precision_1: 0.5 });
    expect(metrics.result()).toEqual({ mrr: 0.75, precision_1: 0.5 });
  });

  it('should reject duplicate names', () => {
    const a = RankingMetric.create({ key: 'mrr' })._unsafeUnwrap();
    const b = RankingMetric.create({ key: 'mrr' })._unsafeUnwrap();
    const result = MetricSuite.fromMetrics([a, b]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Duplicate metric name: mrr');
    }
  });

  it('should update no metric when one of them rejects the batch', () => {
    const metrics = MetricSuite.fromConfigs([{ key: 'mrr' }, { key: 'precision_ia' }])._unsafeUnwrap();
    const result = metrics.update(batch);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('missing_field');
    }
    expect(metrics.result()).toEqual({ mrr: 0, precision_ia: 0 });
  });

  it('should score like metrics updated one by one', () => {
    const configs = [
      { key: 'mrr' },
      { key: 'precision', topn: 1 },
      { key: 'ndcg', topn: 1, seed: 3 },
      { key: 'ndcg', topn: 2, name: 'ndcg_2_weighted' },
    ];
    const tied = [
      { labels: [0, 2, 1], scores: [0.5, 0.5, 0.5] },
      { labels: [1, 0, 2], scores: [0.7, 0.7, 0.1], weights: [2, 1, 1] },
    ];
    const sampleWeight = [1, 3];

    const metrics = MetricSuite.fromConfigs(configs)._unsafeUnwrap();
    const values = metrics.update(tied, sampleWeight)._unsafeUnwrap();

    const expected: Record<string, number> = {};
    for (const config of configs) {
      const single = RankingMetric.fromConfig(config)._unsafeUnwrap();
      expected[single.name] = single.update(tied, sampleWeight)._unsafeUnwrap();
    }
    expect(values).toEqual(expected);
    expect(metrics.result()).toEqual(expected);
  });

  it('should clear every metric on reset', () => {
    const metrics = suite();
    metrics.update(batch);
    metrics.reset();
    expect(metrics.result()).toEqual({ mrr: 0, precision_1: 0 });
  });

  it('should return the configs of its metrics', () => {
    expect(suite().getConfigs()).toEqual([
      { key: 'mrr', name: 'mrr' },
      { key: 'precision', name: 'precision_1', topn: 1 },
    ]);
  });

  it('should fail on an invalid config', () => {
    expect(MetricSuite.fromConfigs([{ key: 'mrr' }, { key: 'nope' }]).isErr()).toBe(true);
  });
});
