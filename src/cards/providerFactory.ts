import { env } from '@/config/env';
import { ICardDetailsProvider, UnknownCardProviderError } from '@/contracts';
import { MockCardDetailsProvider } from './providers/mock/mockCardDetailsProvider';

export const CARD_PROVIDERS = ['mock'] as const;

let _provider: ICardDetailsProvider | null = null;

export function getCardDetailsProvider(): ICardDetailsProvider {
  if (_provider) return _provider;

  const name = env.CARD_PROVIDER;

  if (name === 'mock') {
    _provider = new MockCardDetailsProvider({ delayMs: env.CARD_FETCH_DELAY_MS });
  } else {
    throw new UnknownCardProviderError(name, CARD_PROVIDERS);
  }

  return _provider;
}

export function resetCardDetailsProvider(): void {
  _provider = null;
}
