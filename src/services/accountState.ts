import { LIFECYCLE_STATES } from '../shared/types.js';
import type { Account, LifecycleState } from '../shared/types.js';

const TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  initial: ['connecting', 'shutdown'],
  connecting: ['connected', 'shutdown'],
  connected: ['watching', 'handling', 'shutdown'],
  watching: ['handling', 'connected', 'shutdown'],
  handling: ['watching', 'connected', 'shutdown'],
  shutdown: ['initial'],
};

export class StateTransitionError extends Error {
  readonly from: LifecycleState;
  readonly to: LifecycleState;

  constructor(account: string, from: LifecycleState, to: LifecycleState) {
    super(`${account}: invalid lifecycle transition ${from} -> ${to}`);
    this.name = 'StateTransitionError';
    this.from = from;
    this.to = to;
  }
}

export const canTransition = (from: LifecycleState, to: LifecycleState) => TRANSITIONS[from].includes(to);

export const stateOrdinal = (state: LifecycleState) => LIFECYCLE_STATES.indexOf(state);

export const transition = (account: Account, to: LifecycleState) => {
  if (!canTransition(account.state, to)) {
    throw new StateTransitionError(account.name, account.state, to);
  }
  account.state = to;
};

/**
 * Runs `body` in phase `phase` and puts the previous state back on every
 * exit path, unless the account was shut down meanwhile.
 */
export const withPhase = async <T>(account: Account, phase: LifecycleState, body: () => Promise<T>): Promise<T> => {
  const previous = account.state;
  transition(account, phase);
  try {
    return await body();
  } finally {
    if (account.state === phase) {
      transition(account, previous);
    }
  }
};
