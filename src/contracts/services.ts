import { CardDetails, DisplayState, DisplayStateListener } from './card';
import { CardIntent } from './intent';

export interface ICardDetailsProvider {
  fetchCardDetails(): Promise<CardDetails>;
}

export interface ICardDisplayStore {
  dispatch(intent: CardIntent): void;
  getState(): DisplayState;
  subscribe(listener: DisplayStateListener): () => void;
  settled(): Promise<void>;
  dispose(): void;
}
