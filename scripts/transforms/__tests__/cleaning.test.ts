import { fullName, lineSales, round2, standardizeState, totalAmount, trimText } from '../cleaning';

describe('trimText', () => {
  test('should trim and pass null through', () => {
    expect(trimText('  Electra  ')).toBe('Electra');
    expect(trimText(null)).toBeNull();
  });
});

describe('fullName', () => {
  test('should join first and last name with one space', () => {
    expect(fullName(' Debra ', 'Burks ')).toBe('Debra Burks');
  });

  test('should keep the part that is present', () => {
    expect(fullName(null, 'Burks')).toBe('Burks');
    expect(fullName('Debra', '  ')).toBe('Debra');
  });

  test('should return null when both parts are missing', () => {
    expect(fullName(null, null)).toBeNull();
  });
});

describe('standardizeState', () => {
  test('should map state codes to full names', () => {
    expect(standardizeState('NY')).toBe('New York');
    expect(standardizeState(' ca ')).toBe('California');
    expect(standardizeState('TX')).toBe('Texas');
  });

  test('should keep unknown values trimmed', () => {
    expect(standardizeState(' Ontario ')).toBe('Ontario');
    expect(standardizeState(null)).toBeNull();
  });
});

describe('round2', () => {
  test('should round half away from zero', () => {
    expect(round2(1.005)).toBe(1.01);
    expect(round2(2.345)).toBe(2.35);
    expect(round2(-2.345)).toBe(-2.35);
    expect(round2(10)).toBe(10);
  });

  test('should round exact half cents up despite float noise', () => {
    expect(round2(10.1 * 0.95)).toBe(9.6);
    expect(round2(1234.565)).toBe(1234.57);
    expect(round2(-(10.1 * 0.95))).toBe(-9.6);
  });
});

describe('line amounts', () => {
  test('should apply the discount to the line total', () => {
    expect(lineSales(2, 599.99, 0.2)).toBe(959.98);
    expect(totalAmount(2, 599.99, 0.2)).toBe(959.98);
  });

  test('should round a half-cent line amount up', () => {
    expect(lineSales(1, 10.1, 0.05)).toBe(9.6);
    expect(totalAmount(1, 10.1, 0.05)).toBe(9.6);
    expect(lineSales(3, 20.3, 0.05)).toBe(57.86);
  });

  test('should return null when an input is missing', () => {
    expect(lineSales(null, 599.99, 0.2)).toBeNull();
    expect(totalAmount(1, 599.99, null)).toBeNull();
  });
});
