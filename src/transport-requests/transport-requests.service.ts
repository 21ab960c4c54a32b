import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { InvalidTransitionError } from '../common/state-machine';
import { JobQueueService } from '../jobs/job-queue.service';
import type { ProgressStatus } from './dto/update-transport-request-status.dto';
import { TransportRequest } from './entities/transport-request.entity';
import {
  transportRequestLifecycle,
  type TransportRequestStatus,
} from './transport-request-status';

export type MatchingRequested = {
  transportRequestId: string;
  jobId: string;
};

@Injectable()
export class TransportRequestsService {
  private readonly logger = new Logger(TransportRequestsService.name);

  constructor(
    @InjectRepository(TransportRequest)
    private readonly transportRequests: Repository<TransportRequest>,
    private readonly jobs: JobQueueService,
  ) {}

  async findOne(id: string): Promise<TransportRequest> {
    const request = await this.transportRequests.findOneBy({ id });
    if (!request) throw new NotFoundException('Transport request not found');
    return request;
  }

  /** Queues a matching run. The run itself moves the request to `matching`. */
  async requestMatching(id: string): Promise<MatchingRequested> {
    const request = await this.findOne(id);
    if (request.status !== 'new') {
      throw new InvalidTransitionError('Transport request', request.status, 'matching');
    }

    const jobId = this.jobs.enqueue('match_carriers', { transportRequestId: id });
    this.logger.log(`Matching queued for transport request ${id} (job ${jobId})`);
    return { transportRequestId: id, jobId };
  }

  cancel(id: string): Promise<TransportRequest> {
    return this.transition(id, 'cancelled');
  }

  updateStatus(id: string, status: ProgressStatus): Promise<TransportRequest> {
    return this.transition(id, status);
  }

  private async transition(id: string, to: TransportRequestStatus): Promise<TransportRequest> {
    const request = await this.findOne(id);
    transportRequestLifecycle.assertTransition(request.status, to);

    const { affected } = await this.transportRequests.update(
      { id, status: request.status },
      { status: to },
    );
    const updated = await this.findOne(id);
    if (!affected) throw new InvalidTransitionError('Transport request', updated.status, to);

    this.logger.log(`Transport request ${id}: ${request.status} -> ${to}`);
    return updated;
  }
}
