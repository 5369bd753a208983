import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  VALIDATION_POLL_INTERVAL,
  ValidationWorkerService,
} from './validation-worker.service';
import { ValidationOrchestratorDomainService } from '../domain/services/validation-orchestrator.domain.service';
import { ValidationJob } from '../domain/entities/validation-job.entity';
import { ValidationJobState } from '../domain/enums/validation-job-state.enum';
import { ValidationTrigger } from '../domain/enums/validation-trigger.enum';
import { JobOutcome } from '../domain/types/validation-outcome.type';
import { ValidationConfig } from '../config/validation-config.type';
import { buildTestConfigService } from '../../../test/utils/test-config';

function job(id: string): ValidationJob {
  const now = new Date();
  return {
    id,
    documentId: `doc-${id}`,
    contentRef: `documents/aa/${id}`,
    standardId: null,
    standardVersion: null,
    state: ValidationJobState.RUNNING,
    trigger: ValidationTrigger.UPLOAD,
    attempts: 1,
    maxAttempts: 3,
    enqueuedAt: now,
    availableAt: now,
    startedAt: now,
    finishedAt: null,
    claimedBy: 'worker',
    claimExpiresAt: now,
    lastError: null,
    requiresIntervention: false,
  };
}

describe('ValidationWorkerService', () => {
  let worker: ValidationWorkerService;
  let schedulerRegistry: SchedulerRegistry;
  let orchestrator: {
    claimNext: jest.Mock<Promise<ValidationJob | null>, [string]>;
    processJob: jest.Mock<Promise<JobOutcome>, [ValidationJob, string]>;
  };

  async function createWorker(
    validation: Partial<ValidationConfig> = {},
  ): Promise<void> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ValidationWorkerService,
        SchedulerRegistry,
        { provide: ValidationOrchestratorDomainService, useValue: orchestrator },
        {
          provide: ConfigService,
          useValue: buildTestConfigService(validation),
        },
      ],
    }).compile();

    worker = module.get(ValidationWorkerService);
    schedulerRegistry = module.get(SchedulerRegistry);
  }

  beforeEach(() => {
    orchestrator = {
      claimNext: jest.fn<Promise<ValidationJob | null>, [string]>(),
      processJob: jest.fn<Promise<JobOutcome>, [ValidationJob, string]>(
        async (claimed) => ({
          jobId: claimed.id,
          state: ValidationJobState.SUCCEEDED,
        }),
      ),
    };
  });

  afterEach(async () => {
    await worker.onApplicationShutdown();
  });

  describe('tick', () => {
    it('should fill every free slot and stop at the concurrency limit', async () => {
      await createWorker({ workerConcurrency: 2 });
      orchestrator.claimNext
        .mockResolvedValueOnce(job('1'))
        .mockResolvedValueOnce(job('2'))
        .mockResolvedValueOnce(job('3'));

      const started = await worker.tick();

      expect(started).toBe(2);
      expect(orchestrator.claimNext).toHaveBeenCalledTimes(2);
      expect(orchestrator.processJob).toHaveBeenCalledWith(
        expect.objectContaining({ id: '1' }),
        worker.workerId,
      );
    });

    it('should free a slot once its job settles', async () => {
      await createWorker({ workerConcurrency: 1 });
      orchestrator.claimNext
        .mockResolvedValueOnce(job('1'))
        .mockResolvedValueOnce(job('2'))
        .mockResolvedValue(null);

      expect(await worker.tick()).toBe(1);
      await worker.drain();
      expect(worker.activeJobs).toBe(0);
      expect(await worker.tick()).toBe(1);
    });

    it('should stop when the queue is empty', async () => {
      await createWorker();
      orchestrator.claimNext.mockResolvedValue(null);

      expect(await worker.tick()).toBe(0);
      expect(orchestrator.processJob).not.toHaveBeenCalled();
    });

    it('should survive a failing claim', async () => {
      await createWorker();
      orchestrator.claimNext.mockRejectedValueOnce(new Error('db down'));

      await expect(worker.tick()).resolves.toBe(0);
    });

    it('should survive a crashing job', async () => {
      await createWorker({ workerConcurrency: 1 });
      orchestrator.claimNext.mockResolvedValueOnce(job('1'));
      orchestrator.processJob.mockRejectedValueOnce(new Error('boom'));

      await worker.tick();
      await worker.drain();

      expect(worker.activeJobs).toBe(0);
    });
  });

  describe('lifecycle', () => {
    it('should not poll when disabled', async () => {
      await createWorker({ workerEnabled: false });

      worker.onApplicationBootstrap();

      expect(
        schedulerRegistry.doesExist('interval', VALIDATION_POLL_INTERVAL),
      ).toBe(false);
    });

    it('should register and remove the poll interval', async () => {
      await createWorker({ workerEnabled: true, pollIntervalMs: 60000 });

      worker.onApplicationBootstrap();
      expect(
        schedulerRegistry.doesExist('interval', VALIDATION_POLL_INTERVAL),
      ).toBe(true);

      await worker.onApplicationShutdown();
      expect(
        schedulerRegistry.doesExist('interval', VALIDATION_POLL_INTERVAL),
      ).toBe(false);
    });

    it('should claim nothing after shutdown', async () => {
      await createWorker();
      await worker.onApplicationShutdown();

      expect(await worker.tick()).toBe(0);
      expect(orchestrator.claimNext).not.toHaveBeenCalled();
    });
  });
});
