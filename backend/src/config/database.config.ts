import { registerAs } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import * as path from 'path';

export function toBool(val: string | undefined, fallback: boolean): boolean {
  if (val === undefined) {
    return fallback;
  }
  const s = val.toLowerCase();
  return s === 'true' || s === '1' || s === 'yes';
}

/**
 * TLS settings from DATABASE_SSL, shared with the CLI data source
 */
export function sslOptions(): { rejectUnauthorized: boolean } | false {
  return toBool(process.env.DATABASE_SSL, false)
    ? { rejectUnauthorized: false }
    : false;
}

export default registerAs(
  'database',
  (): TypeOrmModuleOptions => ({
    type: 'postgres',
    // A full connection string (e.g. from a hosted Postgres) wins over host/port
    url: process.env.DATABASE_URL || undefined,
    host: process.env.DATABASE_HOST || 'localhost',
    port: parseInt(process.env.DATABASE_PORT ?? '5432', 10),
    username: process.env.DATABASE_USERNAME || 'postgres',
    password: process.env.DATABASE_PASSWORD || 'postgres',
    database: process.env.DATABASE_NAME || 'phishing_analytics',
    ssl: sslOptions(),
    uuidExtension: 'pgcrypto',
    autoLoadEntities: true,
    migrations: [path.join(__dirname, '..', 'migrations', '*.js')],
    // Schema is owned by migrations; synchronize would fight the DESC indexes
    synchronize: toBool(process.env.DB_SYNCHRONIZE, false),
    migrationsRun: toBool(process.env.DB_MIGRATIONS_RUN, true),
    logging: toBool(process.env.DB_LOGGING, false),
  }),
);
