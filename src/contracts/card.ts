export interface CardDetails {
  readonly cardNumber: string;
  readonly cardHolder: string;
  readonly expiry: string;
  readonly cvv: string;
}

export interface CardFields {
  cardNumber: string;
  cardHolder: string;
  expiry: string;
  cvv: string;
}

export interface DisplayState extends Readonly<CardFields> {
  readonly buttonText: string;
  readonly isRevealed: boolean;
  readonly isLocked: boolean;
  readonly isLoading: boolean;
  readonly isError: boolean;
}

export type DisplayStateListener = (state: DisplayState) => void;
