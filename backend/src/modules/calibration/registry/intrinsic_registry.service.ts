/**
 * INTRINSIC SCORE REGISTRY
 *
 * - FileIntrinsicRegistry:  intrinsic_calibration.json (loaded with the config)
 * - MongoIntrinsicRegistry: calibration_intrinsic_scores collection
 *
 * Unknown methods resolve to status 'none'. A 'computed' entry missing
 * any component is downgraded to 'none'.
 */

import { ownEntry } from '../contracts/calibration.contract.js';
import { CONFIG_FILES } from '../contracts/config.contract.js';
import type { IntrinsicFile, LoadedCalibrationConfig, IntrinsicStatus } from '../contracts/config.contract.js';
import type { IntrinsicRecord, IntrinsicScoreRegistry } from '../contracts/registry.contract.js';
import { IntrinsicScoreModel } from './intrinsic_score.model.js';
import { isMongoConnected } from '../../../db/mongoose.js';

const MONGO_SOURCE = 'mongo:calibration_intrinsic_scores';

function toRecord(
  methodId: string,
  entry: { status: IntrinsicStatus; bTheory?: number; bImpl?: number; bDeploy?: number } | null,
  version: string,
  source: string
): IntrinsicRecord {
  if (!entry) {
    return { methodId, status: 'none', bTheory: null, bImpl: null, bDeploy: null, version, source };
  }

  const { status, bTheory, bImpl, bDeploy } = entry;
  if (status === 'computed' && (bTheory === undefined || bImpl === undefined || bDeploy === undefined)) {
    console.warn(`[Calibration] Intrinsic entry for ${methodId} is computed but incomplete; treating as none`);
    return { methodId, status: 'none', bTheory: null, bImpl: null, bDeploy: null, version, source };
  }

  return {
    methodId,
    status,
    bTheory: bTheory ?? null,
    bImpl: bImpl ?? null,
    bDeploy: bDeploy ?? null,
    version,
    source,
  };
}

// ═══════════════════════════════════════════════════════════════
// FILE
// ═══════════════════════════════════════════════════════════════

export class FileIntrinsicRegistry implements IntrinsicScoreRegistry {
  readonly source: string;

  constructor(private readonly file: Readonly<IntrinsicFile>, source: string = CONFIG_FILES.intrinsic) {
    this.source = source;
  }

  async getIntrinsic(methodId: string): Promise<IntrinsicRecord> {
    const entry = ownEntry(this.file.methods, methodId);
    return toRecord(
      methodId,
      entry
        ? { status: entry.status, bTheory: entry.b_theory, bImpl: entry.b_impl, bDeploy: entry.b_deploy }
        : null,
      this.file.version,
      this.source
    );
  }
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

export class MongoIntrinsicRegistry implements IntrinsicScoreRegistry {
  readonly source = MONGO_SOURCE;

  async getIntrinsic(methodId: string): Promise<IntrinsicRecord> {
    const doc = await IntrinsicScoreModel.findOne({ methodId });
    if (!doc) return toRecord(methodId, null, 'unknown', this.source);

    return toRecord(
      methodId,
      { status: doc.status, bTheory: doc.bTheory, bImpl: doc.bImpl, bDeploy: doc.bDeploy },
      doc.version,
      this.source
    );
  }
}

/**
 * CALIBRATION_REGISTRY=mongo selects the collection when a connection is up.
 */
export function createIntrinsicRegistry(config: LoadedCalibrationConfig): IntrinsicScoreRegistry {
  const mode = process.env.CALIBRATION_REGISTRY || 'file';
  if (mode === 'mongo') {
    if (isMongoConnected()) {
      console.log('[Calibration] Intrinsic registry: MongoDB');
      return new MongoIntrinsicRegistry();
    }
    console.warn('[Calibration] CALIBRATION_REGISTRY=mongo but MongoDB is not connected; using file registry');
  }
  return new FileIntrinsicRegistry(config.intrinsic);
}
