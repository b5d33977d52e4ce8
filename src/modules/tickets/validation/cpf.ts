/**
 * Brazilian CPF (national ID) checks. Accepts `000.000.000-00` or bare
 * digits, with surrounding whitespace; the 11 digits must carry valid check
 * digits.
 */

const CPF_PATTERN = /^(\d{3})\.?(\d{3})\.?(\d{3})-?(\d{2})$/;

/** The 11 bare digits, or null when the value is not shaped like a CPF. */
export function normalizeCpf(value: string): string | null {
  const match = CPF_PATTERN.exec(value.trim());
  return match ? match.slice(1).join('') : null;
}

function checkDigit(digits: number[], firstWeight: number): number {
  const sum = digits.reduce((acc, digit, index) => acc + digit * (firstWeight - index), 0);
  const remainder = (sum * 10) % 11;
  return remainder === 10 ? 0 : remainder;
}

export function isValidCpf(value: string): boolean {
  const normalized = normalizeCpf(value);
  if (!normalized) {
    return false;
  }

  const digits = normalized.split('').map(Number);
  // 000.000.000-00, 111.111.111-11, ... pass the checksum but are not issued
  if (digits.every((digit) => digit === digits[0])) {
    return false;
  }

  return checkDigit(digits.slice(0, 9), 10) === digits[9] && checkDigit(digits.slice(0, 10), 11) === digits[10];
}
