import { ConfigType, registerAs } from '@nestjs/config';
import { readBool, readInt } from './env.util';

export const databaseConfig = registerAs('database', () => ({
  host: process.env.DB_HOST ?? 'localhost',
  port: readInt('DB_PORT', 5432),
  username: process.env.DB_USER,
  password: process.env.DB_PASS,
  database: process.env.DB_NAME,
  ssl: readBool('DB_SSL', false),
  synchronize: readBool('DB_SYNCHRONIZE', false),
  logging: readBool('DB_LOGGING', false),
}));

export type DatabaseConfig = ConfigType<typeof databaseConfig>;
