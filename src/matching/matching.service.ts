import { Injectable, Logger, NotFoundException, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CarriersService } from '../carriers/carriers.service';
import { CarrierRequest } from '../carrier-requests/entities/carrier-request.entity';
import { JobQueueService } from '../jobs/job-queue.service';
import { PackageItem } from '../transport-requests/entities/package-item.entity';
import { TransportRequest } from '../transport-requests/entities/transport-request.entity';
import { toShipmentCargo } from '../transport-requests/shipment-cargo';
import { transportRequestLifecycle } from '../transport-requests/transport-request-status';
import { toMatchingRequest, traceMatching } from './matching-pipeline';

export type MatchingRunResult =
  | {
      status: 'matched';
      transportRequestId: string;
      matchCount: number;
      carrierRequestIds: string[];
    }
  | { status: 'no_matches'; transportRequestId: string }
  | { status: 'skipped'; transportRequestId: string; reason: string };

@Injectable()
export class MatchingService implements OnModuleInit {
  private readonly logger = new Logger(MatchingService.name);

  constructor(
    @InjectRepository(TransportRequest)
    private readonly transportRequests: Repository<TransportRequest>,
    @InjectRepository(PackageItem)
    private readonly packageItems: Repository<PackageItem>,
    @InjectRepository(CarrierRequest)
    private readonly carrierRequests: Repository<CarrierRequest>,
    private readonly carriers: CarriersService,
    private readonly jobs: JobQueueService,
  ) {}

  onModuleInit() {
    this.jobs.register('match_carriers', ({ transportRequestId }) =>
      this.runMatching(transportRequestId),
    );
  }

  /**
   * Matches a `new` request against the active carrier pool and stores one
   * carrier request per surviving carrier. A request already in `matching`
   * is a retried run and is picked up again. A run that throws after the
   * claim puts the request back to `new`. Every run adds records; earlier
   * runs are not de-duplicated.
   */
  async runMatching(transportRequestId: string): Promise<MatchingRunResult> {
    const request = await this.transportRequests.findOneBy({ id: transportRequestId });
    if (!request) throw new NotFoundException('Transport request not found');

    if (request.status === 'new') {
      transportRequestLifecycle.assertTransition('new', 'matching');
      const { affected } = await this.transportRequests.update(
        { id: transportRequestId, status: 'new' },
        { status: 'matching' },
      );
      if (!affected) {
        return this.skip(transportRequestId, 'request left status new before matching started');
      }
    } else if (request.status !== 'matching') {
      return this.skip(transportRequestId, `request is ${request.status}`);
    }

    try {
      return await this.matchClaimed(request);
    } catch (err) {
      // Back to new, claimable by a retry or a fresh matching request.
      await this.resetToNew(transportRequestId);
      throw err;
    }
  }

  private async matchClaimed(request: TransportRequest): Promise<MatchingRunResult> {
    const transportRequestId = request.id;
    const items = await this.packageItems.find({
      where: { transportRequestId },
      order: { createdAt: 'ASC' },
    });
    const cargo = toShipmentCargo(request, items);
    if (cargo.status === 'invalid') {
      await this.resetToNew(transportRequestId);
      return this.skip(transportRequestId, `invalid cargo: ${cargo.errors.join('; ')}`);
    }

    const pool = await this.carriers.findActiveProfiles();
    const trace = traceMatching(toMatchingRequest(request, cargo.cargo), pool);

    this.logger.debug(
      `Request ${transportRequestId}: ${pool.length} active carrier(s), ` +
        trace.stages.map((s) => `${s.name} ${s.survivors.length}`).join(', '),
    );

    if (!trace.candidates.length) {
      await this.resetToNew(transportRequestId);
      this.logger.log(`Matched 0 carriers for transport request ${transportRequestId}`);
      return { status: 'no_matches', transportRequestId };
    }

    const saved = await this.carrierRequests.save(
      trace.candidates.map((match) =>
        this.carrierRequests.create({
          transportRequestId,
          carrierId: match.carrierId,
          status: 'new',
          distanceToPickupKm: match.distanceToPickupKm,
          distanceToDeliveryKm: match.distanceToDeliveryKm,
          inRadius: match.inRadius,
        }),
      ),
    );

    this.logger.log(
      `Matched ${saved.length} carrier(s) for transport request ${transportRequestId}`,
    );
    this.jobs.enqueue('send_carrier_invitations', { transportRequestId });

    return {
      status: 'matched',
      transportRequestId,
      matchCount: saved.length,
      carrierRequestIds: saved.map((r) => r.id),
    };
  }

  private async resetToNew(transportRequestId: string) {
    transportRequestLifecycle.assertTransition('matching', 'new');
    await this.transportRequests.update(
      { id: transportRequestId, status: 'matching' },
      { status: 'new' },
    );
  }

  private skip(transportRequestId: string, reason: string): MatchingRunResult {
    this.logger.warn(`Skipped matching for transport request ${transportRequestId}: ${reason}`);
    return { status: 'skipped', transportRequestId, reason };
  }
}
