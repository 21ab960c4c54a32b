import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { InvalidTransitionError } from '../common/state-machine';
import { JobQueueService } from '../jobs/job-queue.service';
import { TransportRequest } from '../transport-requests/entities/transport-request.entity';
import { transportRequestLifecycle } from '../transport-requests/transport-request-status';
import { SubmitOfferDto } from './dto/submit-offer.dto';
import { CarrierRequest } from './entities/carrier-request.entity';
import { offerLifecycle, SUBMITTED_OFFER_STATUSES } from './offer-status';

export type OfferAcceptance = {
  accepted: CarrierRequest;
  transportRequest: TransportRequest;
  rejectedIds: string[];
};

@Injectable()
export class CarrierRequestsService {
  private readonly logger = new Logger(CarrierRequestsService.name);

  constructor(
    @InjectRepository(CarrierRequest)
    private readonly carrierRequests: Repository<CarrierRequest>,
    @InjectRepository(TransportRequest)
    private readonly transportRequests: Repository<TransportRequest>,
    private readonly dataSource: DataSource,
    private readonly jobs: JobQueueService,
  ) {}

  async findOne(id: string): Promise<CarrierRequest> {
    const record = await this.carrierRequests.findOneBy({ id });
    if (!record) throw new NotFoundException('Carrier request not found');
    return record;
  }

  /** Submitted offers for a request, cheapest first. */
  async listOffers(transportRequestId: string): Promise<CarrierRequest[]> {
    if (!(await this.transportRequests.countBy({ id: transportRequestId }))) {
      throw new NotFoundException('Transport request not found');
    }
    return this.carrierRequests.find({
      where: { transportRequestId, status: In([...SUBMITTED_OFFER_STATUSES]) },
      order: { offeredPrice: 'ASC', responseDate: 'ASC', id: 'ASC' },
    });
  }

  /** The invited carrier's offer. May be revised until the requester decides. */
  async submitOffer(
    id: string,
    dto: SubmitOfferDto,
    now: Date = new Date(),
  ): Promise<CarrierRequest> {
    const record = await this.findOne(id);
    offerLifecycle.assertTransition(record.status, 'offered');

    const { affected } = await this.carrierRequests.update(
      { id, status: record.status },
      {
        status: 'offered',
        offeredPrice: dto.offeredPrice,
        offeredDeliveryDate: dto.offeredDeliveryDate ?? null,
        transportType: dto.transportType ?? null,
        vehicleType: dto.vehicleType ?? null,
        driverLanguage: dto.driverLanguage ?? null,
        notes: dto.notes ?? null,
        responseDate: now,
      },
    );
    const updated = await this.findOne(id);
    if (!affected) throw new InvalidTransitionError('Carrier request', updated.status, 'offered');

    this.logger.log(`Offer ${id} submitted: ${dto.offeredPrice}`);
    return updated;
  }

  /**
   * Awards the request to one offer. The winner, every other open offer and
   * the parent request change together in one transaction; the carriers are
   * notified once it has committed.
   */
  async acceptOffer(id: string): Promise<OfferAcceptance> {
    const acceptance = await this.dataSource.transaction(async (manager) => {
      const offers = manager.getRepository(CarrierRequest);
      const requests = manager.getRepository(TransportRequest);

      const offer = await offers.findOne({ where: { id }, lock: { mode: 'pessimistic_write' } });
      if (!offer) throw new NotFoundException('Carrier request not found');

      const parent = await requests.findOne({
        where: { id: offer.transportRequestId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!parent) throw new NotFoundException('Transport request not found');

      offerLifecycle.assertTransition(offer.status, 'won');
      transportRequestLifecycle.assertTransition(parent.status, 'matched');

      const siblings = await offers.find({
        where: { transportRequestId: parent.id, status: 'offered' },
        order: { createdAt: 'ASC', id: 'ASC' },
      });
      const rejectedIds = siblings.map((s) => s.id).filter((siblingId) => siblingId !== id);

      await offers.update({ id, status: 'offered' }, { status: 'won' });
      if (rejectedIds.length) {
        await offers.update({ id: In(rejectedIds), status: 'offered' }, { status: 'rejected' });
      }
      await requests.update(
        { id: parent.id, status: parent.status },
        { status: 'matched', matchedCarrierId: offer.carrierId },
      );

      const accepted = await offers.findOneBy({ id });
      const transportRequest = await requests.findOneBy({ id: parent.id });
      if (!accepted || !transportRequest) {
        throw new NotFoundException('Carrier request not found');
      }
      return { accepted, transportRequest, rejectedIds };
    });

    this.logger.log(
      `Offer ${id} won transport request ${acceptance.transportRequest.id}; ` +
        `${acceptance.rejectedIds.length} other offer(s) rejected`,
    );

    this.jobs.enqueue('send_offer_decision', { carrierRequestId: id, decision: 'won' });
    for (const rejectedId of acceptance.rejectedIds) {
      this.jobs.enqueue('send_offer_decision', { carrierRequestId: rejectedId, decision: 'rejected' });
    }
    return acceptance;
  }

  async rejectOffer(id: string): Promise<CarrierRequest> {
    const record = await this.findOne(id);
    offerLifecycle.assertTransition(record.status, 'rejected');

    const { affected } = await this.carrierRequests.update(
      { id, status: 'offered' },
      { status: 'rejected' },
    );
    const updated = await this.findOne(id);
    if (!affected) throw new InvalidTransitionError('Carrier request', updated.status, 'rejected');

    this.logger.log(`Offer ${id} rejected`);
    this.jobs.enqueue('send_offer_decision', { carrierRequestId: id, decision: 'rejected' });
    return updated;
  }
}
