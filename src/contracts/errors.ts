export class CardDetailsUnavailableError extends Error {
  constructor(reason: string = 'provider returned no data') {
    super(`Card details unavailable: ${reason}`);
    this.name = 'CardDetailsUnavailableError';
  }
}

export class UnknownCardProviderError extends Error {
  constructor(public readonly provider: string, validProviders: readonly string[]) {
    super(`Unknown card provider: "${provider}". Valid values: ${validProviders.join(', ')}`);
    this.name = 'UnknownCardProviderError';
  }
}
