import mongoose from 'mongoose';
import { config } from '../src/core/config';
import { logger } from '../src/core/logger';
import { Task } from '../src/models';

async function migrate() {
  logger.info('Starting migration...');

  await mongoose.connect(config.mongodb.uri, {
    dbName: config.mongodb.dbName,
  });

  logger.info('Synchronising indexes for tasks');
  const dropped = await Task.syncIndexes();
  logger.info('✓ tasks indexes synchronised', { dropped });

  logger.info('Migration complete');
  await mongoose.disconnect();
}

migrate().catch((error: unknown) => {
  logger.error('Migration failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
