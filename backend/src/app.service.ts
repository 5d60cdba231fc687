import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

export interface ServiceInfo {
  message: string;
  version: string;
  endpoints: Record<string, string>;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  database: 'up' | 'down';
}

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);

  constructor(private readonly dataSource: DataSource) {}

  getInfo(): ServiceInfo {
    return {
      message: 'Phishing URL Analytics API',
      version: '1.0.0',
      endpoints: {
        urls: '/api/urls',
        analyses: '/api/analyses',
        statistics: '/api/analyses/statistics',
        health: '/api/health',
      },
    };
  }

  /**
   * Probe the database with a trivial query
   */
  async checkHealth(): Promise<HealthStatus> {
    try {
      await this.dataSource.query('SELECT 1');
      return { status: 'healthy', database: 'up' };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Database health check failed: ${reason}`);
      return { status: 'degraded', database: 'down' };
    }
  }
}
