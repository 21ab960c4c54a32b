import { Lifecycle } from '../common/state-machine';

export const TRANSPORT_REQUEST_STATUSES = [
  'new',
  'matching',
  'matched',
  'in_transit',
  'delivered',
  'cancelled',
] as const;

export type TransportRequestStatus = (typeof TRANSPORT_REQUEST_STATUSES)[number];

// `matching -> new` is the zero-match recovery taken by the matching job.
export const transportRequestLifecycle = new Lifecycle<TransportRequestStatus>(
  'Transport request',
  {
    new: ['matching', 'cancelled'],
    matching: ['new', 'matched', 'cancelled'],
    matched: ['in_transit', 'cancelled'],
    in_transit: ['delivered', 'cancelled'],
    delivered: [],
    cancelled: [],
  },
);
