import { Global, Module } from '@nestjs/common';
import { envNumber } from '../config/env';
import { JobQueueService } from './job-queue.service';
import { JOB_QUEUE_OPTIONS } from './job.types';

@Global()
@Module({
  providers: [
    {
      provide: JOB_QUEUE_OPTIONS,
      useFactory: () => ({
        maxAttempts: envNumber('JOB_MAX_ATTEMPTS', 3),
        retryDelayMs: envNumber('JOB_RETRY_DELAY_MS', 1000),
        maxFinishedJobs: envNumber('JOB_RETAIN_FINISHED', 1000),
      }),
    },
    JobQueueService,
  ],
  exports: [JobQueueService],
})
export class JobsModule {}
