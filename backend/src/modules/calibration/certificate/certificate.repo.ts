/**
 * Certificate Repository
 *
 * Mongo-backed when a connection is up, in-memory otherwise.
 * The in-memory store keeps only the latest certificate per instance.
 */

import type { ExportedCertificate } from '../contracts/certificate.contract.js';
import { CalibrationCertificateModel } from './certificate.model.js';
import { isMongoConnected } from '../../../db/mongoose.js';

export interface StoredCertificate {
  instanceId: string;
  certificateHash: string;
  storedAt: string;
  record: unknown;
}

export interface CertificateStore {
  save(certificate: ExportedCertificate): Promise<void>;
  findLatest(instanceId: string): Promise<StoredCertificate | null>;
}

export class MemoryCertificateRepo implements CertificateStore {
  private readonly latest = new Map<string, StoredCertificate>();

  async save(certificate: ExportedCertificate): Promise<void> {
    this.latest.set(certificate.instance_id, {
      instanceId: certificate.instance_id,
      certificateHash: certificate.audit_trail.certificate_hash,
      storedAt: new Date().toISOString(),
      record: certificate,
    });
  }

  async findLatest(instanceId: string): Promise<StoredCertificate | null> {
    return this.latest.get(instanceId) ?? null;
  }

  size(): number {
    return this.latest.size;
  }
}

export class MongoCertificateRepo implements CertificateStore {
  async save(certificate: ExportedCertificate): Promise<void> {
    await CalibrationCertificateModel.create({
      instanceId: certificate.instance_id,
      status: certificate.status,
      certificateHash: certificate.audit_trail.certificate_hash,
      configHash: certificate.audit_trail.config_hash,
      calibrationScore: certificate.calibration_score,
      record: certificate,
    });
    console.log(`[CertificateRepo] Saved ${certificate.instance_id} (${certificate.status})`);
  }

  async findLatest(instanceId: string): Promise<StoredCertificate | null> {
    const doc = await CalibrationCertificateModel.findOne({ instanceId }).sort({ storedAt: -1 });
    if (!doc) return null;
    return {
      instanceId: doc.instanceId,
      certificateHash: doc.certificateHash,
      storedAt: doc.storedAt.toISOString(),
      record: doc.record,
    };
  }
}

// Singleton
let instance: CertificateStore | null = null;

export function getCertificateRepo(): CertificateStore {
  if (!instance) {
    instance = isMongoConnected() ? new MongoCertificateRepo() : new MemoryCertificateRepo();
  }
  return instance;
}

export function setCertificateRepo(repo: CertificateStore | null): void {
  instance = repo;
}
