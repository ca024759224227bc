import { CardDetails, CardFields, DisplayEvent, DisplayEventType, DisplayState } from '@/contracts';
import { buttonTextFor, placeholderFields, projectFields } from './presenter';

export const INITIAL_DISPLAY_STATE: DisplayState = Object.freeze({
  ...placeholderFields(),
  buttonText: buttonTextFor(false),
  isRevealed: false,
  isLocked: false,
  isLoading: true,
  isError: false,
});

function maskedFields(cached: CardDetails | null): CardFields {
  return cached ? projectFields(cached, false) : placeholderFields();
}

function freeze(state: DisplayState): DisplayState {
  return Object.freeze({ ...state });
}

/**
 * Total transition function for the card display. Returns the current state
 * object unchanged when an event is a no-op, so callers can skip publishing by
 * reference comparison.
 *
 * `cached` is the card data the store holds when the event is applied; for
 * LOAD_SUCCEEDED the freshly fetched details travel on the event itself.
 */
export function getNextState(state: DisplayState, event: DisplayEvent, cached: CardDetails | null): DisplayState {
  switch (event.type) {
    case DisplayEventType.LOAD_STARTED:
      return freeze({
        ...maskedFields(cached),
        buttonText: buttonTextFor(false),
        isRevealed: false,
        isLocked: false,
        isLoading: true,
        isError: false,
      });

    case DisplayEventType.LOAD_SUCCEEDED:
      return freeze({
        ...projectFields(event.details, false),
        buttonText: buttonTextFor(false),
        isRevealed: false,
        isLocked: false,
        isLoading: false,
        isError: false,
      });

    case DisplayEventType.LOAD_FAILED:
      return freeze({
        ...maskedFields(cached),
        buttonText: buttonTextFor(false),
        isRevealed: false,
        isLocked: false,
        isLoading: false,
        isError: true,
      });

    case DisplayEventType.VISIBILITY_TOGGLED: {
      if (state.isLoading) return state;
      // Reveal is never permitted while locked; re-assert the hidden state
      if (state.isLocked) {
        if (!state.isRevealed && state.buttonText === buttonTextFor(false)) return state;
        return freeze({ ...state, isRevealed: false, buttonText: buttonTextFor(false) });
      }
      if (!cached) return state;
      const isRevealed = !state.isRevealed;
      return freeze({
        ...state,
        ...projectFields(cached, isRevealed),
        isRevealed,
        buttonText: buttonTextFor(isRevealed),
      });
    }

    case DisplayEventType.LOCK_TOGGLED: {
      if (state.isLoading) return state;
      if (state.isLocked) {
        // Unlocking keeps whatever is currently displayed
        return freeze({ ...state, isLocked: false });
      }
      return freeze({
        ...state,
        ...maskedFields(cached),
        isLocked: true,
        isRevealed: false,
        buttonText: buttonTextFor(false),
      });
    }

    default: {
      const unhandled: never = event;
      return unhandled;
    }
  }
}
