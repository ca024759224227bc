import {
  maskCardNumber,
  maskExpiry,
  maskCvv,
  buttonTextFor,
  projectFields,
  placeholderFields,
} from '@/cards/presenter';

const details = {
  cardNumber: '1234 5678 9012 3456',
  cardHolder: 'Nick Antigravity',
  expiry: '12/28',
  cvv: '123',
};

describe('masking helpers', () => {
  it('keeps only the last four digits of the card number', () => {
    expect(maskCardNumber('1234 5678 9012 3456')).toBe('**** **** **** 3456');
  });

  it('keeps the last four characters of an unspaced number', () => {
    expect(maskCardNumber('4000056655665556')).toBe('**** **** **** 5556');
  });

  it('masks expiry and cvv with fixed literals', () => {
    expect(maskExpiry()).toBe('**/**');
    expect(maskCvv()).toBe('***');
  });
});

describe('buttonTextFor', () => {
  it('reads "Hide Details" when revealed', () => {
    expect(buttonTextFor(true)).toBe('Hide Details');
  });

  it('reads "Reveal Details" when hidden', () => {
    expect(buttonTextFor(false)).toBe('Reveal Details');
  });
});

describe('projectFields', () => {
  it('returns the raw values when revealed', () => {
    expect(projectFields(details, true)).toEqual({
      cardNumber: '1234 5678 9012 3456',
      cardHolder: 'Nick Antigravity',
      expiry: '12/28',
      cvv: '123',
    });
  });

  it('masks everything but the holder name when hidden', () => {
    expect(projectFields(details, false)).toEqual({
      cardNumber: '**** **** **** 3456',
      cardHolder: 'Nick Antigravity',
      expiry: '**/**',
      cvv: '***',
    });
  });
});

describe('placeholderFields', () => {
  it('is fully masked with an empty holder', () => {
    expect(placeholderFields()).toEqual({
      cardNumber: '**** **** **** ****',
      cardHolder: '',
      expiry: '**/**',
      cvv: '***',
    });
  });
});
