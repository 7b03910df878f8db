import { INestApplicationContext, Logger } from '@nestjs/common';
import { Sequelize } from 'sequelize-typescript';
import { checkMigrationStatus, runMigrations } from './database/run-migration';

const logger = new Logger('Bootstrap');

/** Verifies the connection and brings the schema up to date. */
export async function bootstrapApp(app: INestApplicationContext): Promise<void> {
  const sequelize = app.get(Sequelize);

  try {
    logger.log('Connecting to database...');
    await sequelize.authenticate();
    logger.log('Database connected');

    await runMigrations(sequelize);
    await checkMigrationStatus(sequelize);
  } catch (error) {
    logger.error('Database initialization failed', error instanceof Error ? error.stack : undefined);
    throw error;
  }
}
