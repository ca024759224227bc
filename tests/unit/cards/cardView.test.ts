import { DisplayState } from '@/contracts';
import { buildCardView } from '@/cards/cardView';

const masked: DisplayState = {
  cardNumber: '**** **** **** 3456',
  cardHolder: 'Nick Antigravity',
  expiry: '**/**',
  cvv: '***',
  buttonText: 'Reveal Details',
  isRevealed: false,
  isLocked: false,
  isLoading: false,
  isError: false,
};

describe('buildCardView', () => {
  it('lays out the card face with labelled fields', () => {
    expect(buildCardView(masked, { issuerName: 'NeoBank' })).toEqual({
      issuerName: 'NeoBank',
      cardNumber: '**** **** **** 3456',
      fields: [
        { label: 'CARD HOLDER', value: 'Nick Antigravity' },
        { label: 'EXPIRES', value: '**/**' },
        { label: 'CVV', value: '***' },
      ],
      button: { text: 'Reveal Details', disabled: false },
      status: 'masked',
    });
  });

  it('reports a revealed card', () => {
    const view = buildCardView(
      { ...masked, cardNumber: '1234 5678 9012 3456', isRevealed: true, buttonText: 'Hide Details' },
      { issuerName: 'NeoBank' },
    );

    expect(view.status).toBe('revealed');
    expect(view.button).toEqual({ text: 'Hide Details', disabled: false });
  });

  it('disables the button while locked', () => {
    const view = buildCardView({ ...masked, isLocked: true }, { issuerName: 'NeoBank' });

    expect(view.status).toBe('locked');
    expect(view.button.disabled).toBe(true);
  });

  it('disables the button while loading', () => {
    const view = buildCardView({ ...masked, isLoading: true }, { issuerName: 'NeoBank' });

    expect(view.status).toBe('loading');
    expect(view.button.disabled).toBe(true);
  });

  it('reports a card locked after a failed reload as locked', () => {
    const view = buildCardView({ ...masked, isError: true, isLocked: true }, { issuerName: 'NeoBank' });

    expect(view.status).toBe('locked');
    expect(view.button.disabled).toBe(true);
  });

  it('reports a failed load', () => {
    expect(buildCardView({ ...masked, isError: true }, { issuerName: 'NeoBank' }).status).toBe('error');
  });
});
