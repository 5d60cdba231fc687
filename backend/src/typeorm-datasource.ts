import 'reflect-metadata';
import { DataSource } from 'typeorm';
import * as path from 'path';
import { SubmittedUrl } from './modules/urls/entities/submitted-url.entity';
import { AnalysisResult } from './modules/analysis/entities/analysis-result.entity';
import { sslOptions } from './config/database.config';

// Used by the TypeORM CLI (npm run migration:run / migration:revert)
export default new DataSource({
  type: 'postgres',
  url: process.env.DATABASE_URL || undefined,
  host: process.env.DATABASE_HOST || 'localhost',
  port: parseInt(process.env.DATABASE_PORT || '5432', 10),
  username: process.env.DATABASE_USERNAME || 'postgres',
  password: process.env.DATABASE_PASSWORD || 'postgres',
  database: process.env.DATABASE_NAME || 'phishing_analytics',
  ssl: sslOptions(),
  entities: [SubmittedUrl, AnalysisResult],
  migrations: [path.join(__dirname, 'migrations/*.js')],
});
