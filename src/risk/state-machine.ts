import { createChildLogger } from '../logger.js';

const log = createChildLogger('state-machine');

export type OrderState =
  | 'IDLE'
  | 'SPREAD_CHECK'
  | 'PLACING'
  | 'RESOLVING'
  | 'MONITORING'
  | 'CLOSING'
  | 'CLOSED'
  | 'FAILED';

type StateTransition = [OrderState, OrderState];

/** Allowed transitions */
const VALID_TRANSITIONS: StateTransition[] = [
  ['IDLE', 'SPREAD_CHECK'],
  ['SPREAD_CHECK', 'PLACING'],
  ['SPREAD_CHECK', 'RESOLVING'],      // final open-position check after the last attempt
  ['SPREAD_CHECK', 'FAILED'],
  ['PLACING', 'SPREAD_CHECK'],        // retry after a failed placement
  ['PLACING', 'RESOLVING'],
  ['PLACING', 'FAILED'],
  ['RESOLVING', 'MONITORING'],
  ['RESOLVING', 'FAILED'],
  ['MONITORING', 'CLOSING'],
  ['CLOSING', 'CLOSED'],
  ['CLOSING', 'FAILED'],
  ['FAILED', 'CLOSING'],            // a failed close may be claimed again
];

const TERMINAL: ReadonlySet<OrderState> = new Set(['CLOSED', 'FAILED']);

/**
 * Lifecycle of one plan entry. Invalid transitions throw.
 */
export class OrderStateMachine {
  private state: OrderState = 'IDLE';
  private history: Array<{ from: OrderState; to: OrderState; at: number }> = [];
  readonly label: string;

  constructor(label: string) {
    this.label = label;
  }

  get current(): OrderState {
    return this.state;
  }

  transition(to: OrderState): void {
    if (this.state === to) return; // noop

    if (!this.canTransition(to)) {
      const msg = `Invalid state transition for ${this.label}: ${this.state} → ${to}`;
      log.error({ trade: this.label, from: this.state, to }, msg);
      throw new Error(msg);
    }

    log.debug({ trade: this.label, from: this.state, to }, 'State transition');
    this.history.push({ from: this.state, to, at: Date.now() });
    this.state = to;
  }

  canTransition(to: OrderState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  isTerminal(): boolean {
    return TERMINAL.has(this.state);
  }

  getHistory(): ReadonlyArray<{ from: OrderState; to: OrderState; at: number }> {
    return this.history;
  }
}
