import { Inject, Injectable, ServiceUnavailableException } from '@nestjs/common';
import type { ReviewApiError } from '../common/api-error';
import { DATABASE_HEALTH_PORT, type DatabaseHealthPort } from './ports/database-health.port';

@Injectable()
export class ServiceInfoQuery {
  constructor(
    @Inject(DATABASE_HEALTH_PORT)
    private readonly database: DatabaseHealthPort,
  ) {}

  getInfo() {
    return {
      service: 'review-service',
      kind: 'http-api',
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }

  async getDatabaseHealth() {
    try {
      await this.database.ping();
    } catch (error) {
      const body: ReviewApiError = {
        code: 'DATABASE_UNAVAILABLE',
        message: `Database check failed: ${error instanceof Error ? error.message : String(error)}`,
      };
      throw new ServiceUnavailableException(body);
    }

    return {
      ...this.getInfo(),
      database: 'up',
    };
  }
}
