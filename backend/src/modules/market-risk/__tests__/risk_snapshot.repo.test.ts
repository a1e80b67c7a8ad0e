/**
 * Memory Snapshot Repository Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { RiskSnapshot } from '../contracts/market_risk.contracts.js';
import { createMemoryRiskSnapshotRepo, type RiskSnapshotRepo } from '../storage/risk_snapshot.repo.js';

function snapshot(asOf: string, overallScore: number, alerted = false): RiskSnapshot {
  return {
    asOf,
    overallScore,
    tier: 'GREEN',
    dimensionScores: { recession: 1, credit: 1, valuation: 1, liquidity: 1, positioning: null },
    confidenceScore: 89.3,
    confidenceLevel: 'HIGH',
    excludedDimensions: ['positioning'],
    activeWarnings: [],
    allSignals: { recession: [], credit: [], valuation: [], liquidity: [], positioning: [] },
    indicators: { credit: { hy_spread: 3.5 } },
    alerted,
    computedAt: `${asOf}T00:00:00.000Z`,
  };
}

describe('MemoryRiskSnapshotRepo', () => {
  let repo: RiskSnapshotRepo;

  beforeEach(() => {
    repo = createMemoryRiskSnapshotRepo();
  });

  it('should start empty', async () => {
    expect(await repo.count()).toBe(0);
    expect(await repo.getLatest()).toBeNull();
    expect(await repo.getRecent(10)).toEqual([]);
  });

  it('should return snapshots newest first regardless of insert order', async () => {
    await repo.save(snapshot('2024-02-01', 2));
    await repo.save(snapshot('2024-03-01', 3));
    await repo.save(snapshot('2024-01-01', 1));

    const recent = await repo.getRecent(10);
    expect(recent.map(s => s.asOf)).toEqual(['2024-03-01', '2024-02-01', '2024-01-01']);
    expect((await repo.getLatest())?.asOf).toBe('2024-03-01');
  });

  it('should limit recent results', async () => {
    for (const month of ['01', '02', '03', '04']) {
      await repo.save(snapshot(`2024-${month}-01`, 1));
    }
    const recent = await repo.getRecent(2);
    expect(recent.map(s => s.asOf)).toEqual(['2024-04-01', '2024-03-01']);
  });

  it('should upsert by asOf', async () => {
    await repo.save(snapshot('2024-01-01', 1));
    await repo.save(snapshot('2024-01-01', 4.2));

    expect(await repo.count()).toBe(1);
    expect((await repo.getLatest())?.overallScore).toBe(4.2);
  });

  it('should not share arrays with the caller', async () => {
    const s = snapshot('2024-01-01', 1);
    await repo.save(s);
    s.excludedDimensions.push('credit');

    expect((await repo.getLatest())?.excludedDimensions).toEqual(['positioning']);
  });

  it('should not share nested records with the caller', async () => {
    const s = snapshot('2024-01-01', 1);
    await repo.save(s);
    s.indicators.credit = { hy_spread: 9.9 };
    s.dimensionScores.credit = 10;
    s.allSignals.credit.push('CRITICAL: changed later');

    const stored = await repo.getLatest();
    expect(stored?.indicators).toEqual({ credit: { hy_spread: 3.5 } });
    expect(stored?.dimensionScores.credit).toBe(1);
    expect(stored?.allSignals.credit).toEqual([]);
  });

  it('should not let readers mutate stored history', async () => {
    await repo.save(snapshot('2024-01-01', 1));
    const [read] = await repo.getRecent(1);
    read.activeWarnings.push('doubleInversion');

    expect((await repo.getLatest())?.activeWarnings).toEqual([]);
  });

  it('should accept seed snapshots', async () => {
    const seeded = createMemoryRiskSnapshotRepo([snapshot('2024-01-01', 1), snapshot('2024-01-08', 2)]);
    expect(await seeded.count()).toBe(2);
  });
});

describe('MemoryRiskSnapshotRepo history queries', () => {
  let repo: RiskSnapshotRepo;

  beforeEach(async () => {
    repo = createMemoryRiskSnapshotRepo([
      snapshot('2024-01-01', 2),
      snapshot('2024-02-01', 7, true),
      snapshot('2024-03-01', 5),
      snapshot('2024-04-01', 8.5, true),
      snapshot('2024-05-01', 4),
    ]);
  });

  it('should return only strictly earlier periods, newest first', async () => {
    const before = await repo.getBefore('2024-04-01', 2);
    expect(before.map(s => s.asOf)).toEqual(['2024-03-01', '2024-02-01']);
  });

  it('should find earlier periods when backfilling behind newer ones', async () => {
    const before = await repo.getBefore('2024-01-15', 12);
    expect(before.map(s => s.asOf)).toEqual(['2024-01-01']);
  });

  it('should return an inclusive range oldest first', async () => {
    const range = await repo.getRange('2024-02-01', '2024-04-01');
    expect(range.map(s => s.asOf)).toEqual(['2024-02-01', '2024-03-01', '2024-04-01']);
  });

  it('should leave the range open without an end', async () => {
    const range = await repo.getRange('2024-04-01');
    expect(range.map(s => s.asOf)).toEqual(['2024-04-01', '2024-05-01']);
  });

  it('should list alerted periods newest first', async () => {
    const alerts = await repo.getAlertHistory(10);
    expect(alerts.map(s => s.asOf)).toEqual(['2024-04-01', '2024-02-01']);
    expect((await repo.getAlertHistory(1)).map(s => s.asOf)).toEqual(['2024-04-01']);
  });

  it('should summarise stored history', async () => {
    expect(await repo.getStats()).toEqual({
      count: 5,
      alertsCount: 2,
      dateRange: { start: '2024-01-01', end: '2024-05-01' },
    });
  });

  it('should report an empty history without a date range', async () => {
    const empty = createMemoryRiskSnapshotRepo();
    expect(await empty.getStats()).toEqual({ count: 0, alertsCount: 0, dateRange: null });
  });
});
