import { InvalidTransitionError } from "@core/errors/app-errors";

export enum DispatchState {
  PENDING = "pending",
  COMPOSING = "composing",
  AUTHENTICATING = "authenticating",
  SENDING = "sending",
  SENT = "sent",
  FAILED = "failed",
}

const TRANSITIONS: Record<DispatchState, readonly DispatchState[]> = {
  [DispatchState.PENDING]: [DispatchState.COMPOSING, DispatchState.FAILED],
  [DispatchState.COMPOSING]: [DispatchState.AUTHENTICATING, DispatchState.FAILED],
  [DispatchState.AUTHENTICATING]: [DispatchState.SENDING, DispatchState.FAILED],
  [DispatchState.SENDING]: [DispatchState.SENT, DispatchState.FAILED],
  [DispatchState.SENT]: [],
  [DispatchState.FAILED]: [],
};

export interface DispatchTransition {
  from: DispatchState;
  to: DispatchState;
  at: Date;
}

/**
 * Lifecycle of one recipient within a dispatch. Retries stay inside
 * `sending` and are counted as attempts.
 */
export class DispatchStateMachine {
  private current = DispatchState.PENDING;
  private attemptCount = 0;
  readonly history: DispatchTransition[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  get state(): DispatchState {
    return this.current;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  /** Attempts beyond the first. */
  get retryCount(): number {
    return Math.max(0, this.attemptCount - 1);
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: DispatchState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: DispatchState): void {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.history.push({ from: this.current, to, at: this.clock() });
    this.current = to;
  }

  beginAttempt(): number {
    if (this.current !== DispatchState.SENDING) {
      throw new InvalidTransitionError(this.current, `${DispatchState.SENDING} attempt`);
    }
    this.attemptCount++;
    return this.attemptCount;
  }

  canRetry(maxAttempts: number): boolean {
    return this.current === DispatchState.SENDING && this.attemptCount < maxAttempts;
  }
}
