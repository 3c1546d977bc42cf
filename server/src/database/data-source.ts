import 'reflect-metadata';
import { join } from 'node:path';

import { DataSource } from 'typeorm';

import { env } from '../config/env';
import { Agent } from './entities/Agent';
import { ChatSession } from './entities/ChatSession';
import { Trace } from './entities/Trace';
import { TraceStep } from './entities/TraceStep';

export const AppDataSource = new DataSource({
  type: 'postgres',
  host: env.DB_HOST,
  port: env.DB_PORT,
  username: env.DB_USERNAME,
  password: env.DB_PASSWORD,
  database: env.DB_NAME,
  synchronize: false,
  migrationsRun: true,
  logging: env.DB_LOGGING,
  entities: [Agent, ChatSession, Trace, TraceStep],
  migrations: [join(__dirname, 'migrations/*.{ts,js}')],
  migrationsTableName: 'typeorm_migrations',
});
