/**
 * Intrinsic Score MongoDB Model (1 doc per method)
 */

import mongoose, { Schema, Document } from 'mongoose';
import { INTRINSIC_STATUSES, IntrinsicStatus } from '../contracts/config.contract.js';

export interface IIntrinsicScoreDoc extends Document {
  methodId: string;
  status: IntrinsicStatus;
  bTheory?: number;
  bImpl?: number;
  bDeploy?: number;
  version: string;
  lastUpdated?: string;
}

const IntrinsicScoreSchema = new Schema<IIntrinsicScoreDoc>({
  methodId: { type: String, required: true, unique: true },
  status: { type: String, enum: [...INTRINSIC_STATUSES], required: true },
  bTheory: { type: Number, min: 0, max: 1 },
  bImpl: { type: Number, min: 0, max: 1 },
  bDeploy: { type: Number, min: 0, max: 1 },
  version: { type: String, required: true },
  lastUpdated: { type: String },
}, {
  timestamps: true,
});

export const IntrinsicScoreModel = mongoose.model<IIntrinsicScoreDoc>(
  'IntrinsicScore',
  IntrinsicScoreSchema,
  'calibration_intrinsic_scores'
);
