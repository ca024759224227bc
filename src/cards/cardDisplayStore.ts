import {
  CardDetails,
  CardDetailsUnavailableError,
  CardIntent,
  DisplayEvent,
  DisplayEventType,
  DisplayState,
  DisplayStateListener,
  ICardDetailsProvider,
  ICardDisplayStore,
} from '@/contracts';
import { cardDetailsSchema } from '@/schemas/cardDetails';
import { getNextState, INITIAL_DISPLAY_STATE } from './transitions';

export interface CardDisplayStoreOptions {
  /** Issue the initial load from the constructor. Defaults to true. */
  autoLoad?: boolean;
}

/**
 * Single-writer owner of the card display state.
 *
 * Every accepted intent replaces the snapshot and pushes it to all current
 * subscribers in production order. Only the most recently issued load may
 * write the cache; resolutions of superseded loads are dropped.
 */
export class CardDisplayStore implements ICardDisplayStore {
  private state: DisplayState = INITIAL_DISPLAY_STATE;
  private cachedDetails: CardDetails | null = null;
  private readonly listeners = new Set<DisplayStateListener>();
  private readonly outbox: DisplayState[] = [];
  // Snapshot most recently handed to listeners; lags `state` only mid-delivery
  private lastDelivered: DisplayState = INITIAL_DISPLAY_STATE;
  private delivering = false;
  private loadSeq = 0;
  private pendingLoad: Promise<void> = Promise.resolve();
  private disposed = false;

  constructor(private readonly provider: ICardDetailsProvider, options: CardDisplayStoreOptions = {}) {
    if (options.autoLoad ?? true) {
      this.dispatch(CardIntent.LOAD_CARD_DETAILS);
    }
  }

  getState(): DisplayState {
    return this.state;
  }

  dispatch(intent: CardIntent): void {
    if (this.disposed) return;

    switch (intent) {
      case CardIntent.LOAD_CARD_DETAILS:
        this.loadCardDetails();
        return;
      case CardIntent.TOGGLE_VISIBILITY:
        this.apply({ type: DisplayEventType.VISIBILITY_TOGGLED });
        return;
      case CardIntent.TOGGLE_LOCK:
        this.apply({ type: DisplayEventType.LOCK_TOGGLED });
        return;
      default: {
        const unhandled: never = intent;
        console.warn(JSON.stringify({ level: 'warn', message: 'Ignoring unknown card intent', intent: String(unhandled) }));
      }
    }
  }

  subscribe(listener: DisplayStateListener): () => void {
    this.listeners.add(listener);
    this.notify(listener, this.lastDelivered);
    return () => {
      this.listeners.delete(listener);
    };
  }

  settled(): Promise<void> {
    return this.pendingLoad;
  }

  dispose(): void {
    this.disposed = true;
    // Any in-flight load becomes stale
    this.loadSeq++;
    this.listeners.clear();
    this.outbox.length = 0;
  }

  private loadCardDetails(): void {
    const seq = ++this.loadSeq;
    this.apply({ type: DisplayEventType.LOAD_STARTED });

    // The executor runs synchronously, so a provider that throws instead of
    // rejecting still lands in the failure branch
    const fetch = new Promise<CardDetails>((resolve) => resolve(this.provider.fetchCardDetails()));

    this.pendingLoad = fetch.then(
      (result: unknown) => {
        if (seq !== this.loadSeq) {
          console.log(JSON.stringify({ level: 'info', message: 'Discarding superseded card load', seq, latestSeq: this.loadSeq }));
          return;
        }
        const parsed = cardDetailsSchema.safeParse(result);
        if (!parsed.success) {
          const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ') || 'payload';
          this.failLoad(new CardDetailsUnavailableError(`malformed provider result (${fields})`));
          return;
        }
        // The cache is a private frozen copy; the provider's object stays with the provider
        const details: CardDetails = Object.freeze({ ...parsed.data });
        this.cachedDetails = details;
        this.apply({ type: DisplayEventType.LOAD_SUCCEEDED, details });
        console.log(JSON.stringify({ level: 'info', message: 'Card details loaded', last4: details.cardNumber.slice(-4) }));
      },
      (err: unknown) => {
        if (seq !== this.loadSeq) {
          console.log(JSON.stringify({ level: 'info', message: 'Discarding superseded card load failure', seq, error: String(err) }));
          return;
        }
        this.failLoad(err);
      },
    );
  }

  private failLoad(err: unknown): void {
    console.error(JSON.stringify({ level: 'error', message: 'Failed to load card details', error: String(err) }));
    this.apply({ type: DisplayEventType.LOAD_FAILED });
  }

  private apply(event: DisplayEvent): void {
    const next = getNextState(this.state, event, this.cachedDetails);
    if (next === this.state) return;
    this.state = next;
    this.publish(next);
  }

  private publish(snapshot: DisplayState): void {
    this.outbox.push(snapshot);
    // A listener that dispatches re-entrantly queues its snapshot behind the
    // one being delivered
    if (this.delivering) return;

    this.delivering = true;
    try {
      let next = this.outbox.shift();
      while (next !== undefined) {
        this.lastDelivered = next;
        for (const listener of [...this.listeners]) {
          // Skip listeners removed (or a store disposed) earlier in this round
          if (this.disposed || !this.listeners.has(listener)) continue;
          this.notify(listener, next);
        }
        next = this.outbox.shift();
      }
    } finally {
      this.delivering = false;
    }
  }

  private notify(listener: DisplayStateListener, snapshot: DisplayState): void {
    try {
      listener(snapshot);
    } catch (err) {
      console.error(JSON.stringify({ level: 'error', message: 'Card state listener threw', error: String(err) }));
    }
  }
}
