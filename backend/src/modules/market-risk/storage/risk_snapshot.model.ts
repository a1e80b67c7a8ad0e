/**
 * RISK SNAPSHOT MODEL (MongoDB)
 *
 * One document per assessed period.
 * Collection: risk_snapshots
 */

import mongoose, { Schema, Document } from 'mongoose';
import { DIMENSIONS } from '../contracts/market_risk.contracts.js';
import type {
  ConfidenceLevel,
  Dimension,
  IndicatorSet,
  RiskTier,
  WarningKey,
} from '../contracts/market_risk.contracts.js';

export interface IRiskSnapshot extends Document {
  asOf: string;
  overallScore: number;
  tier: RiskTier;
  dimensionScores: Record<Dimension, number | null>;
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
  excludedDimensions: Dimension[];
  activeWarnings: WarningKey[];
  allSignals: Record<Dimension, string[]>;
  indicators: IndicatorSet;
  alerted: boolean;
  computedAt: string;
  createdAt: Date;
  updatedAt: Date;
}

const RiskSnapshotSchema = new Schema<IRiskSnapshot>({
  asOf: { type: String, required: true, unique: true },
  overallScore: { type: Number, required: true },
  tier: { type: String, required: true, enum: ['GREEN', 'YELLOW', 'RED'] },
  dimensionScores: { type: Schema.Types.Mixed, required: true },
  confidenceScore: { type: Number, required: true },
  confidenceLevel: { type: String, required: true, enum: ['LOW', 'MEDIUM', 'HIGH'] },
  excludedDimensions: [{ type: String, enum: [...DIMENSIONS] }],
  activeWarnings: [{ type: String }],
  allSignals: { type: Schema.Types.Mixed, default: {} },
  indicators: { type: Schema.Types.Mixed, required: true },
  alerted: { type: Boolean, default: false, index: true },
  computedAt: { type: String, required: true },
}, {
  timestamps: true,
  collection: 'risk_snapshots',
  minimize: false,
});

export const RiskSnapshotModel = mongoose.model<IRiskSnapshot>('RiskSnapshot', RiskSnapshotSchema);
