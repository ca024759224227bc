import { CardDetails } from './card';

// Intents a caller may dispatch to the card display store
export enum CardIntent {
  LOAD_CARD_DETAILS = 'LOAD_CARD_DETAILS',
  TOGGLE_VISIBILITY = 'TOGGLE_VISIBILITY',
  TOGGLE_LOCK = 'TOGGLE_LOCK',
}

// Events the store feeds into the transition function. The load intent splits
// into a synchronous start and an asynchronous outcome.
export enum DisplayEventType {
  LOAD_STARTED = 'LOAD_STARTED',
  LOAD_SUCCEEDED = 'LOAD_SUCCEEDED',
  LOAD_FAILED = 'LOAD_FAILED',
  VISIBILITY_TOGGLED = 'VISIBILITY_TOGGLED',
  LOCK_TOGGLED = 'LOCK_TOGGLED',
}

export type DisplayEvent =
  | { type: DisplayEventType.LOAD_STARTED }
  | { type: DisplayEventType.LOAD_SUCCEEDED; details: CardDetails }
  | { type: DisplayEventType.LOAD_FAILED }
  | { type: DisplayEventType.VISIBILITY_TOGGLED }
  | { type: DisplayEventType.LOCK_TOGGLED };
