import { CardDetails, CardDetailsUnavailableError, ICardDetailsProvider } from '@/contracts';

type CallRecord = { method: string; args: unknown[]; timestamp: number };

export const DEMO_CARD_DETAILS: CardDetails = Object.freeze({
  cardNumber: '1234 5678 9012 3456',
  cardHolder: 'Nick Antigravity',
  expiry: '12/28',
  cvv: '123',
});

export interface MockCardDetailsProviderOptions {
  /** Simulated fetch latency. 0 resolves on the next timer tick. */
  delayMs?: number;
  details?: CardDetails;
}

/**
 * In-process card data source. Records every call so tests can assert on
 * fetch counts, and can be told to fail once or until cleared.
 */
export class MockCardDetailsProvider implements ICardDetailsProvider {
  private calls: CallRecord[] = [];
  private details: CardDetails;
  private readonly delayMs: number;
  private failure: Error | null = null;
  private pendingFailures: Error[] = [];

  constructor(options: MockCardDetailsProviderOptions = {}) {
    this.delayMs = options.delayMs ?? 0;
    this.details = Object.freeze({ ...(options.details ?? DEMO_CARD_DETAILS) });
  }

  getCalls(): CallRecord[] {
    return [...this.calls];
  }

  clearCalls(): void {
    this.calls.length = 0;
  }

  setCardDetails(details: CardDetails): void {
    this.details = Object.freeze({ ...details });
  }

  failNextFetch(error: Error = new CardDetailsUnavailableError()): void {
    this.pendingFailures.push(error);
  }

  setFailure(error: Error | null): void {
    this.failure = error;
  }

  async fetchCardDetails(): Promise<CardDetails> {
    this.calls.push({ method: 'fetchCardDetails', args: [], timestamp: Date.now() });
    // Resolve which outcome this call gets before suspending, so concurrent
    // fetches consume queued failures in call order
    const failure = this.pendingFailures.shift() ?? this.failure;
    const details = this.details;

    await new Promise<void>((resolve) => setTimeout(resolve, this.delayMs));

    if (failure) throw failure;
    return details;
  }
}
