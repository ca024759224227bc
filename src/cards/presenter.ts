import { CardDetails, CardFields } from '@/contracts';

export const REVEAL_BUTTON_TEXT = 'Reveal Details';
export const HIDE_BUTTON_TEXT = 'Hide Details';

export const MASKED_EXPIRY = '**/**';
export const MASKED_CVV = '***';
const MASKED_GROUPS = '**** **** ****';

export function maskCardNumber(cardNumber: string): string {
  return `${MASKED_GROUPS} ${cardNumber.slice(-4)}`;
}

export function maskExpiry(): string {
  return MASKED_EXPIRY;
}

export function maskCvv(): string {
  return MASKED_CVV;
}

export function buttonTextFor(isRevealed: boolean): string {
  return isRevealed ? HIDE_BUTTON_TEXT : REVEAL_BUTTON_TEXT;
}

/**
 * Display fields for a card. The holder name is never masked.
 */
export function projectFields(details: CardDetails, isRevealed: boolean): CardFields {
  return {
    cardNumber: isRevealed ? details.cardNumber : maskCardNumber(details.cardNumber),
    cardHolder: details.cardHolder,
    expiry: isRevealed ? details.expiry : maskExpiry(),
    cvv: isRevealed ? details.cvv : maskCvv(),
  };
}

// Shown until the first load resolves
export function placeholderFields(): CardFields {
  return {
    cardNumber: `${MASKED_GROUPS} ****`,
    cardHolder: '',
    expiry: MASKED_EXPIRY,
    cvv: MASKED_CVV,
  };
}
