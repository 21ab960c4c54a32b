import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { formatAmount } from '../common/money';
import { envString, frontendUrl } from '../config/env';
import { Carrier } from '../carriers/entities/carrier.entity';
import { EmailService } from '../email/email.service';
import {
  CarrierInvitationEmail,
  carrierInvitationEmailText,
} from '../email/templates/carrier-invitation-email';
import {
  OFFER_DECISION_SUBJECTS,
  OfferDecisionEmail,
  offerDecisionEmailText,
} from '../email/templates/offer-decision-email';
import type { OfferDecision } from '../jobs/job.types';
import { PackageItem } from '../transport-requests/entities/package-item.entity';
import { TransportRequest } from '../transport-requests/entities/transport-request.entity';
import { describeCargo, toShipmentCargo } from '../transport-requests/shipment-cargo';
import { CarrierRequest } from './entities/carrier-request.entity';

type MailContext = {
  carrierRequest: CarrierRequest;
  carrier: Carrier;
  request: TransportRequest;
};

export function describeRoute(request: TransportRequest): string {
  const from = request.startAddress || request.startCountry || '?';
  const to = request.destinationAddress || request.destinationCountry || '?';
  return `${from} → ${to}`;
}

export function formatPickupDate(date: Date | null, timeZone: string): string {
  if (!date) return 'nach Absprache';
  return new Intl.DateTimeFormat('de-DE', { dateStyle: 'medium', timeZone }).format(date);
}

/** Composes and sends the mails a carrier receives about one carrier request. */
@Injectable()
export class CarrierMailerService {
  private readonly logger = new Logger(CarrierMailerService.name);

  constructor(
    @InjectRepository(CarrierRequest)
    private readonly carrierRequests: Repository<CarrierRequest>,
    @InjectRepository(Carrier)
    private readonly carriers: Repository<Carrier>,
    @InjectRepository(TransportRequest)
    private readonly transportRequests: Repository<TransportRequest>,
    @InjectRepository(PackageItem)
    private readonly packageItems: Repository<PackageItem>,
    private readonly email: EmailService,
  ) {}

  offerUrl(carrierRequestId: string): string {
    const base = envString('OFFER_BASE_URL', '') || `${frontendUrl()}/offers`;
    return `${base.replace(/\/+$/, '')}/${carrierRequestId}`;
  }

  async sendInvitation(carrierRequestId: string): Promise<boolean> {
    const context = await this.load(carrierRequestId);
    if (!context) return false;
    const { carrierRequest, carrier, request } = context;

    const items = await this.packageItems.find({
      where: { transportRequestId: request.id },
      order: { createdAt: 'ASC' },
    });
    const cargo = toShipmentCargo(request, items);

    const props = {
      companyName: carrier.companyName,
      route: describeRoute(request),
      pickupDate: formatPickupDate(request.pickupDateFrom, this.timeZone()),
      cargoSummary: cargo.status === 'ok' ? describeCargo(cargo.cargo) : 'siehe Anfrage',
      distanceToPickupKm: carrierRequest.distanceToPickupKm,
      offerUrl: this.offerUrl(carrierRequest.id),
    };

    return this.email.send({
      to: carrier.contactEmail,
      subject: `Neue Transportanfrage: ${props.route}`,
      react: CarrierInvitationEmail(props),
      text: carrierInvitationEmailText(props),
    });
  }

  async sendDecision(carrierRequestId: string, decision: OfferDecision): Promise<boolean> {
    const context = await this.load(carrierRequestId);
    if (!context) return false;
    const { carrierRequest, carrier, request } = context;

    const price = carrierRequest.offeredPrice;
    const props = {
      decision,
      companyName: carrier.companyName,
      route: describeRoute(request),
      pickupDate: formatPickupDate(request.pickupDateFrom, this.timeZone()),
      offeredPrice:
        price === null ? null : `${formatAmount(price)} ${envString('QUOTE_CURRENCY', 'EUR')}`,
    };

    return this.email.send({
      to: carrier.contactEmail,
      subject: OFFER_DECISION_SUBJECTS[decision],
      react: OfferDecisionEmail(props),
      text: offerDecisionEmailText(props),
    });
  }

  private timeZone(): string {
    return envString('PRICING_TIME_ZONE', 'Europe/Berlin');
  }

  private async load(carrierRequestId: string): Promise<MailContext | null> {
    const carrierRequest = await this.carrierRequests.findOneBy({ id: carrierRequestId });
    if (!carrierRequest) {
      this.logger.warn(`Carrier request ${carrierRequestId} not found; no email sent`);
      return null;
    }

    const [carrier, request] = await Promise.all([
      this.carriers.findOneBy({ id: carrierRequest.carrierId }),
      this.transportRequests.findOneBy({ id: carrierRequest.transportRequestId }),
    ]);
    if (!carrier || !request) {
      this.logger.warn(
        `Carrier request ${carrierRequestId} references a missing ${carrier ? 'transport request' : 'carrier'}; no email sent`,
      );
      return null;
    }

    return { carrierRequest, carrier, request };
  }
}
