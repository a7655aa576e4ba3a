/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';

export async function connectMongo(url: string | undefined = process.env.MONGO_URL): Promise<boolean> {
  if (!url) {
    console.log('[Mongo] MONGO_URL not set, running without database');
    return false;
  }
  if (isMongoConnected()) return true;

  await mongoose.connect(url);
  console.log(`[Mongo] Connected to ${mongoose.connection.name}`);
  return true;
}

export function isMongoConnected(): boolean {
  return mongoose.connection.readyState === 1;
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
    console.log('[Mongo] Disconnected');
  }
}
