import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { JobQueueService } from '../jobs/job-queue.service';
import { CarrierMailerService } from './carrier-mailer.service';
import { CarrierRequest } from './entities/carrier-request.entity';
import { offerLifecycle } from './offer-status';

export type InvitationDispatchResult = {
  transportRequestId: string;
  sent: number;
  failed: number;
  /** Records another dispatch claimed first. */
  skipped: number;
};

export class InvitationDispatchError extends Error {
  constructor(readonly result: InvitationDispatchResult) {
    super(
      `${result.failed} invitation(s) for transport request ${result.transportRequestId} could not be sent`,
    );
    this.name = 'InvitationDispatchError';
  }
}

@Injectable()
export class InvitationsService implements OnModuleInit {
  private readonly logger = new Logger(InvitationsService.name);

  constructor(
    @InjectRepository(CarrierRequest)
    private readonly carrierRequests: Repository<CarrierRequest>,
    private readonly mailer: CarrierMailerService,
    private readonly jobs: JobQueueService,
  ) {}

  onModuleInit() {
    this.jobs.register('send_carrier_invitations', ({ transportRequestId }) =>
      this.dispatchInvitations(transportRequestId),
    );
    this.jobs.register('send_offer_decision', async ({ carrierRequestId, decision }) => {
      const delivered = await this.mailer.sendDecision(carrierRequestId, decision);
      if (!delivered) {
        this.logger.warn(`Offer decision (${decision}) for ${carrierRequestId} was not delivered`);
      }
      return delivered;
    });
  }

  /**
   * Invites every carrier whose record is still `new`. Each record is claimed
   * (`new -> sent`) before its mail goes out, so concurrent dispatches never
   * send the same invitation twice. A failed or throwing send releases its claim and the
   * whole dispatch throws, which lets the job queue retry the leftovers.
   */
  async dispatchInvitations(
    transportRequestId: string,
    now: Date = new Date(),
  ): Promise<InvitationDispatchResult> {
    const pending = await this.carrierRequests.find({
      where: { transportRequestId, status: 'new' },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
    const result: InvitationDispatchResult = { transportRequestId, sent: 0, failed: 0, skipped: 0 };

    for (const record of pending) {
      offerLifecycle.assertTransition(record.status, 'sent');
      const claimedAt = new Date(now.getTime());
      const { affected } = await this.carrierRequests.update(
        { id: record.id, status: 'new' },
        { status: 'sent', emailSentAt: claimedAt },
      );
      if (!affected) {
        result.skipped += 1;
        continue;
      }

      if (await this.sendInvitation(record.id)) {
        result.sent += 1;
      } else {
        result.failed += 1;
        await this.carrierRequests.update(
          { id: record.id, status: 'sent', emailSentAt: claimedAt },
          { status: 'new', emailSentAt: null },
        );
      }
    }

    this.logger.log(
      `Invitations for transport request ${transportRequestId}: ` +
        `${result.sent} sent, ${result.failed} failed, ${result.skipped} skipped`,
    );
    if (result.failed) throw new InvitationDispatchError(result);
    return result;
  }

  /** A send that throws counts as failed, so its claim is released like any other failure. */
  private async sendInvitation(carrierRequestId: string): Promise<boolean> {
    try {
      return await this.mailer.sendInvitation(carrierRequestId);
    } catch (err) {
      this.logger.error(
        `Invitation for carrier request ${carrierRequestId} failed: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      return false;
    }
  }
}
