import { Lifecycle } from '../common/state-machine';

export const OFFER_STATUSES = ['new', 'sent', 'offered', 'won', 'rejected'] as const;

export type OfferStatus = (typeof OFFER_STATUSES)[number];

/** Statuses in which a carrier has put a price on the table. */
export const SUBMITTED_OFFER_STATUSES: readonly OfferStatus[] = ['offered', 'won', 'rejected'];

// An invited carrier may revise its offer until the requester decides.
export const offerLifecycle = new Lifecycle<OfferStatus>('Carrier request', {
  new: ['sent'],
  sent: ['offered'],
  offered: ['offered', 'won', 'rejected'],
  won: [],
  rejected: [],
});
