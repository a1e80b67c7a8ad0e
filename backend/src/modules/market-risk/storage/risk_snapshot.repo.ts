/**
 * RISK SNAPSHOT REPOSITORY
 *
 * History of recorded assessments, keyed by period (`asOf`).
 * Mongo-backed in production, in-memory when no MONGO_URL is configured
 * and in tests.
 */

import type { RiskHistoryStats, RiskSnapshot } from '../contracts/market_risk.contracts.js';
import { RiskSnapshotModel } from './risk_snapshot.model.js';

export interface RiskSnapshotRepo {
  /** Upsert by `asOf`. */
  save(snapshot: RiskSnapshot): Promise<RiskSnapshot>;
  getLatest(): Promise<RiskSnapshot | null>;
  /** Newest first. */
  getRecent(limit: number): Promise<RiskSnapshot[]>;
  /** Snapshots strictly earlier than `asOf`, newest first. */
  getBefore(asOf: string, limit: number): Promise<RiskSnapshot[]>;
  /** Inclusive on both ends, oldest first. No `end` = open-ended. */
  getRange(start: string, end?: string): Promise<RiskSnapshot[]>;
  /** Alerted snapshots only, newest first. */
  getAlertHistory(limit: number): Promise<RiskSnapshot[]>;
  getStats(): Promise<RiskHistoryStats>;
  count(): Promise<number>;
}

function toSnapshot(doc: RiskSnapshot): RiskSnapshot {
  return structuredClone({
    asOf: doc.asOf,
    overallScore: doc.overallScore,
    tier: doc.tier,
    dimensionScores: doc.dimensionScores,
    confidenceScore: doc.confidenceScore,
    confidenceLevel: doc.confidenceLevel,
    excludedDimensions: doc.excludedDimensions,
    activeWarnings: doc.activeWarnings,
    allSignals: doc.allSignals,
    indicators: doc.indicators,
    alerted: doc.alerted === true,
    computedAt: doc.computedAt,
  });
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

export const mongoRiskSnapshotRepo: RiskSnapshotRepo = {
  async save(snapshot) {
    await RiskSnapshotModel.updateOne(
      { asOf: snapshot.asOf },
      { $set: snapshot },
      { upsert: true },
    );
    return snapshot;
  },

  async getLatest() {
    const doc = await RiskSnapshotModel
      .findOne()
      .sort({ asOf: -1 })
      .lean<RiskSnapshot>();
    return doc ? toSnapshot(doc) : null;
  },

  async getRecent(limit = 52) {
    const docs = await RiskSnapshotModel
      .find()
      .sort({ asOf: -1 })
      .limit(limit)
      .lean<RiskSnapshot[]>();
    return docs.map(toSnapshot);
  },

  async getBefore(asOf, limit) {
    const docs = await RiskSnapshotModel
      .find({ asOf: { $lt: asOf } })
      .sort({ asOf: -1 })
      .limit(limit)
      .lean<RiskSnapshot[]>();
    return docs.map(toSnapshot);
  },

  async getRange(start, end) {
    const docs = await RiskSnapshotModel
      .find({ asOf: end === undefined ? { $gte: start } : { $gte: start, $lte: end } })
      .sort({ asOf: 1 })
      .lean<RiskSnapshot[]>();
    return docs.map(toSnapshot);
  },

  async getAlertHistory(limit = 10) {
    const docs = await RiskSnapshotModel
      .find({ alerted: true })
      .sort({ asOf: -1 })
      .limit(limit)
      .lean<RiskSnapshot[]>();
    return docs.map(toSnapshot);
  },

  async getStats() {
    const [count, alertsCount, first, last] = await Promise.all([
      RiskSnapshotModel.countDocuments(),
      RiskSnapshotModel.countDocuments({ alerted: true }),
      RiskSnapshotModel.findOne().sort({ asOf: 1 }).select('asOf').lean<{ asOf: string }>(),
      RiskSnapshotModel.findOne().sort({ asOf: -1 }).select('asOf').lean<{ asOf: string }>(),
    ]);

    return {
      count,
      alertsCount,
      dateRange: first && last ? { start: first.asOf, end: last.asOf } : null,
    };
  },

  async count() {
    return await RiskSnapshotModel.countDocuments();
  },
};

// ═══════════════════════════════════════════════════════════════
// MEMORY
// ═══════════════════════════════════════════════════════════════

export function createMemoryRiskSnapshotRepo(seed: RiskSnapshot[] = []): RiskSnapshotRepo {
  const byPeriod = new Map<string, RiskSnapshot>();
  for (const s of seed) byPeriod.set(s.asOf, toSnapshot(s));

  const oldestFirst = (): RiskSnapshot[] =>
    [...byPeriod.values()].sort((a, b) => (a.asOf < b.asOf ? -1 : a.asOf > b.asOf ? 1 : 0));
  const newestFirst = (): RiskSnapshot[] => oldestFirst().reverse();

  return {
    async save(snapshot) {
      byPeriod.set(snapshot.asOf, toSnapshot(snapshot));
      return snapshot;
    },

    async getLatest() {
      const latest = newestFirst()[0];
      return latest ? toSnapshot(latest) : null;
    },

    async getRecent(limit = 52) {
      return newestFirst().slice(0, limit).map(toSnapshot);
    },

    async getBefore(asOf, limit) {
      return newestFirst().filter(s => s.asOf < asOf).slice(0, limit).map(toSnapshot);
    },

    async getRange(start, end) {
      return oldestFirst()
        .filter(s => s.asOf >= start && (end === undefined || s.asOf <= end))
        .map(toSnapshot);
    },

    async getAlertHistory(limit = 10) {
      return newestFirst().filter(s => s.alerted).slice(0, limit).map(toSnapshot);
    },

    async getStats() {
      const all = oldestFirst();
      const first = all[0];
      const last = all[all.length - 1];
      return {
        count: all.length,
        alertsCount: all.filter(s => s.alerted).length,
        dateRange: first && last ? { start: first.asOf, end: last.asOf } : null,
      };
    },

    async count() {
      return byPeriod.size;
    },
  };
}
