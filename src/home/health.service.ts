import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { describeError } from '../utils/errors/domain-errors';
import { ValidationWorkerService } from '../validation/workers/validation-worker.service';

export type HealthReport = {
  status: 'healthy' | 'unhealthy';
  database: { accessible: boolean; error?: string };
  worker: { id: string; activeJobs: number };
};

/**
 * Health Check Service
 *
 * Used by load balancers and monitoring to verify the database is reachable
 * and to see what the validation worker of this instance is doing.
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly worker: ValidationWorkerService,
  ) {}

  async check(): Promise<HealthReport> {
    const database = await this.checkDatabase();
    return {
      status: database.accessible ? 'healthy' : 'unhealthy',
      database,
      worker: { id: this.worker.workerId, activeJobs: this.worker.activeJobs },
    };
  }

  private async checkDatabase(): Promise<HealthReport['database']> {
    try {
      await this.dataSource.query('SELECT 1');
      return { accessible: true };
    } catch (error) {
      this.logger.warn(`[HEALTH] Database check failed: ${describeError(error)}`);
      return { accessible: false, error: 'Database unreachable' };
    }
  }
}
