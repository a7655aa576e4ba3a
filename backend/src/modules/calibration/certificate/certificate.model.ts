/**
 * Calibration Certificate MongoDB Model
 *
 * Stores exported records; a re-run appends a new document.
 */

import mongoose, { Schema, Document } from 'mongoose';
import type { CertificateStatus } from '../contracts/certificate.contract.js';

export interface ICalibrationCertificateDoc extends Document {
  instanceId: string;
  status: CertificateStatus;
  certificateHash: string;
  configHash: string;
  calibrationScore: number | null;
  record: unknown;
  storedAt: Date;
}

const CalibrationCertificateSchema = new Schema<ICalibrationCertificateDoc>({
  instanceId: { type: String, required: true },
  status: { type: String, enum: ['CALIBRATED', 'SKIPPED', 'REJECTED', 'FAILED'], required: true },
  certificateHash: { type: String, required: true },
  configHash: { type: String, required: true },
  calibrationScore: { type: Number, default: null },
  record: { type: Schema.Types.Mixed, required: true },
  storedAt: { type: Date, default: Date.now },
}, {
  timestamps: false,
});

CalibrationCertificateSchema.index({ instanceId: 1, storedAt: -1 });

export const CalibrationCertificateModel = mongoose.model<ICalibrationCertificateDoc>(
  'CalibrationCertificate',
  CalibrationCertificateSchema,
  'calibration_certificates'
);
