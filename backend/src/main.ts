/**
 * Process entry: connect Mongo (optional), build, listen.
 */

import { buildServer } from './server.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { errorMessage } from './modules/calibration/contracts/calibration.errors.js';

const PORT = Number(process.env.PORT) || 8001;
const HOST = process.env.HOST || '0.0.0.0';

async function start(): Promise<void> {
  await connectMongo();
  const app = await buildServer();

  const shutdown = async (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    await app.close();
    await disconnectMongo();
    process.exit(0);
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ port: PORT, host: HOST });
  console.log(`[Server] Listening on ${HOST}:${PORT}`);
}

start().catch((error: unknown) => {
  console.error('[Server] Startup failed:', errorMessage(error));
  process.exit(1);
});
