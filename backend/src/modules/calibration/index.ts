/**
 * Calibration module
 */

export * from './contracts/calibration.contract.js';
export * from './contracts/calibration.errors.js';
export * from './contracts/config.contract.js';
export * from './contracts/evidence.contract.js';
export * from './contracts/certificate.contract.js';
export * from './contracts/decision.contract.js';
export * from './contracts/registry.contract.js';

export {
  getCalibrationConfig,
  loadCalibrationConfig,
  readConfigSources,
  resolveCalibrationConfig,
  resetCalibrationConfig,
} from './config/calibration_config.service.js';
export { CalibrationEngine, getCalibrationEngine, resetCalibrationEngine } from './engine/calibration_engine.service.js';
export type { CalibrateOptions, CalibrationOutcome } from './engine/calibration_engine.service.js';
export { fuse } from './fusion/choquet_fusion.service.js';
export { evaluateLayer, evaluateLayers } from './layers/layer_catalog.js';
export { exportCertificate, verifyCertificate, verifyExportedCertificate } from './certificate/certificate.builder.js';
export { getCertificateRepo, setCertificateRepo, MemoryCertificateRepo } from './certificate/certificate.repo.js';
export type { CertificateStore, StoredCertificate } from './certificate/certificate.repo.js';
export { FileIntrinsicRegistry, MongoIntrinsicRegistry, createIntrinsicRegistry } from './registry/intrinsic_registry.service.js';
export { decide, resolveThreshold } from './validation/decision.service.js';
export { validatePlan, exportPlanReport } from './validation/plan_validation.service.js';
export { registerCalibrationRoutes } from './routes/calibration.routes.js';
