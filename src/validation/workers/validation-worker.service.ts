import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { randomUUID } from 'crypto';
import { hostname } from 'os';
import { AllConfigType } from '../../config/config.type';
import { describeError } from '../../utils/errors/domain-errors';
import { ValidationJob } from '../domain/entities/validation-job.entity';
import { ValidationOrchestratorDomainService } from '../domain/services/validation-orchestrator.domain.service';

export const VALIDATION_POLL_INTERVAL = 'validation-poll';

/**
 * Background worker that polls the job queue.
 *
 * Every poll fills the free slots (up to `validation.workerConcurrency`) with
 * claimed jobs. A failure while claiming or processing is logged and the
 * worker keeps polling.
 */
@Injectable()
export class ValidationWorkerService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(ValidationWorkerService.name);
  readonly workerId = `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;
  private readonly active = new Set<Promise<void>>();
  private stopping = false;

  constructor(
    private readonly orchestrator: ValidationOrchestratorDomainService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  onApplicationBootstrap(): void {
    const enabled = this.configService.getOrThrow('validation.workerEnabled', {
      infer: true,
    });
    if (!enabled) {
      this.logger.log('Validation worker disabled');
      return;
    }

    const pollIntervalMs = this.configService.getOrThrow(
      'validation.pollIntervalMs',
      { infer: true },
    );
    const interval = setInterval(() => {
      this.tick().catch((error: unknown) =>
        this.logger.error(`[POLL] ${describeError(error)}`),
      );
    }, pollIntervalMs);
    this.schedulerRegistry.addInterval(VALIDATION_POLL_INTERVAL, interval);

    this.logger.log(
      `Validation worker ${this.workerId} polling every ${pollIntervalMs}ms ` +
        `with ${this.concurrency} slot(s)`,
    );
  }

  async onApplicationShutdown(): Promise<void> {
    this.stopping = true;
    if (
      this.schedulerRegistry.doesExist('interval', VALIDATION_POLL_INTERVAL)
    ) {
      this.schedulerRegistry.deleteInterval(VALIDATION_POLL_INTERVAL);
    }
    if (this.active.size > 0) {
      this.logger.log(`Waiting for ${this.active.size} running job(s)`);
    }
    await this.drain();
  }

  get activeJobs(): number {
    return this.active.size;
  }

  /**
   * Claims jobs into every free slot. Resolves with the number of jobs
   * started; they keep running after the promise settles.
   */
  async tick(): Promise<number> {
    let started = 0;

    while (!this.stopping && this.active.size < this.concurrency) {
      let job: ValidationJob | null;
      try {
        job = await this.orchestrator.claimNext(this.workerId);
      } catch (error) {
        this.logger.error(`[CLAIM] ${describeError(error)}`);
        break;
      }
      if (!job) {
        break;
      }

      const jobId = job.id;
      const run: Promise<void> = this.orchestrator
        .processJob(job, this.workerId)
        .then((outcome) =>
          this.logger.debug(`[JOB] ${jobId} finished as ${outcome.state}`),
        )
        .catch((error: unknown) =>
          this.logger.error(`[JOB] ${jobId} crashed: ${describeError(error)}`),
        )
        .finally(() => this.active.delete(run));
      this.active.add(run);
      started++;
    }
    return started;
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.active]);
  }

  private get concurrency(): number {
    return this.configService.getOrThrow('validation.workerConcurrency', {
      infer: true,
    });
  }
}
