import { DisplayState } from '@/contracts';

export type CardStatus = 'loading' | 'error' | 'locked' | 'revealed' | 'masked';

export interface CardViewField {
  label: string;
  value: string;
}

export interface CardView {
  issuerName: string;
  cardNumber: string;
  fields: CardViewField[];
  button: {
    text: string;
    disabled: boolean;
  };
  status: CardStatus;
}

export interface CardViewOptions {
  issuerName: string;
}

function statusOf(state: DisplayState): CardStatus {
  // Lock outranks a load error
  if (state.isLoading) return 'loading';
  if (state.isLocked) return 'locked';
  if (state.isError) return 'error';
  return state.isRevealed ? 'revealed' : 'masked';
}

// View model for the card face; the presentation layer renders it as-is
export function buildCardView(state: DisplayState, options: CardViewOptions): CardView {
  return {
    issuerName: options.issuerName,
    cardNumber: state.cardNumber,
    fields: [
      { label: 'CARD HOLDER', value: state.cardHolder },
      { label: 'EXPIRES', value: state.expiry },
      { label: 'CVV', value: state.cvv },
    ],
    button: {
      text: state.buttonText,
      disabled: state.isLoading || state.isLocked,
    },
    status: statusOf(state),
  };
}
