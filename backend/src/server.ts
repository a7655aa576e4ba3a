/**
 * Calibration API server
 *
 * Config is loaded before the server listens; a rejected
 * configuration stops startup.
 */

import Fastify, { FastifyInstance } from 'fastify';

import { getCalibrationEngine } from './modules/calibration/engine/calibration_engine.service.js';
import { registerCalibrationRoutes } from './modules/calibration/routes/calibration.routes.js';

export async function buildServer(options: { logger?: boolean } = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });

  const engine = await getCalibrationEngine();
  console.log(`[Server] Calibration engine ready (${engine.config.configHash.slice(0, 19)}, registry ${engine.registrySource})`);

  await registerCalibrationRoutes(app);
  return app;
}
