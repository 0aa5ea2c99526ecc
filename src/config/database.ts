import mongoose from 'mongoose';
import { dbConfig } from './index';
import { createLogger } from '../utils/logger';

const log = createLogger('database');

mongoose.set('strictQuery', true);

mongoose.connection.on('disconnected', () => {
  log.warn('MongoDB disconnected');
});

mongoose.connection.on('error', (error: unknown) => {
  log.error('MongoDB connection error', { error: error instanceof Error ? error.message : String(error) });
});

/**
 * Connect to MongoDB using the configured URI and pool settings
 */
export const connectDB = async (): Promise<typeof mongoose> => {
  const connection = await mongoose.connect(dbConfig.uri, dbConfig.options);
  log.info(`MongoDB connected: ${connection.connection.host}/${connection.connection.name}`);
  return connection;
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
  log.info('MongoDB connection closed');
};

/**
 * Round-trip to the server; rejects when the connection is down
 */
export const pingDB = async (): Promise<void> => {
  const db = mongoose.connection.db;
  if (mongoose.connection.readyState !== 1 || !db) {
    throw new Error('not connected');
  }
  await db.admin().ping();
};
