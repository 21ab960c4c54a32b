import { Lifecycle } from '../common/state-machine';

export const QUOTE_STATUSES = ['pending', 'accepted', 'declined', 'expired'] as const;

export type QuoteStatus = (typeof QUOTE_STATUSES)[number];

export const quoteLifecycle = new Lifecycle<QuoteStatus>('Quote', {
  pending: ['accepted', 'declined', 'expired'],
  accepted: [],
  declined: [],
  expired: [],
});
