/**
 * INTRINSIC SCORE REGISTRY CONTRACT
 *
 * Source of the BASE layer's three intrinsic components.
 * Backed by intrinsic_calibration.json or a MongoDB collection.
 */

import type { IntrinsicStatus } from './config.contract.js';

export interface IntrinsicRecord {
  readonly methodId: string;
  readonly status: IntrinsicStatus;
  readonly bTheory: number | null;
  readonly bImpl: number | null;
  readonly bDeploy: number | null;
  readonly version: string;
  readonly source: string;
}

export interface IntrinsicScoreRegistry {
  readonly source: string;
  getIntrinsic(methodId: string): Promise<IntrinsicRecord>;
}
