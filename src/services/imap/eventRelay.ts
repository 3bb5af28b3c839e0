/**
 * Single-slot hand-off between a producer that must never block (IMAP event
 * listeners) and a consumer that may be busy for a long time. While an event
 * is pending, further offers are folded into it through `merge` instead of
 * queueing, so a burst during a busy consumer yields one delivery.
 */
export type EventRelay<T> = {
  offer: (event: T) => 'queued' | 'coalesced' | 'closed';
  next: () => Promise<T | null>;
  close: (error?: unknown) => void;
  readonly pending: T | null;
  readonly closed: boolean;
};

export type RelayMerge<T> = (pending: T, incoming: T) => T;

const latestWins = <T>(_pending: T, incoming: T) => incoming;

export const createEventRelay = <T>(merge: RelayMerge<T> = latestWins): EventRelay<T> => {
  let slot: { event: T } | null = null;
  let closed = false;
  let failure: { error: unknown } | null = null;
  let waiter: { resolve: (event: T | null) => void; reject: (error: unknown) => void } | null = null;

  const offer = (event: T) => {
    if (closed) {
      return 'closed' as const;
    }
    if (waiter) {
      const current = waiter;
      waiter = null;
      current.resolve(event);
      return 'queued' as const;
    }
    if (slot) {
      slot = { event: merge(slot.event, event) };
      return 'coalesced' as const;
    }
    slot = { event };
    return 'queued' as const;
  };

  const next = () => {
    if (failure) {
      return Promise.reject(failure.error);
    }
    if (slot) {
      const { event } = slot;
      slot = null;
      return Promise.resolve(event);
    }
    if (closed) {
      return Promise.resolve(null);
    }
    if (waiter) {
      return Promise.reject(new Error('event relay supports a single consumer'));
    }
    return new Promise<T | null>((resolve, reject) => {
      waiter = { resolve, reject };
    });
  };

  const close = (error?: unknown) => {
    if (closed) {
      return;
    }
    closed = true;
    slot = null;
    if (error !== undefined) {
      failure = { error };
    }
    const current = waiter;
    waiter = null;
    if (!current) {
      return;
    }
    if (failure) {
      current.reject(failure.error);
    } else {
      current.resolve(null);
    }
  };

  return {
    offer,
    next,
    close,
    get pending() {
      return slot ? slot.event : null;
    },
    get closed() {
      return closed;
    },
  };
};
