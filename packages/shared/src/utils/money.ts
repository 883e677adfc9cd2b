// All generator arithmetic happens in integer cents. Dollars only appear at the
// edges: catalog prices read from numeric columns and the run summary.

const DECIMAL_PRICE = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

function toCents(dollars: number): number {
  return Math.round(dollars * 100);
}

function toDollars(cents: number): number {
  return cents / 100;
}

/**
 * Parses a numeric-column string such as "1500.00" or "89.9" into cents without
 * going through floating point. Numbers are accepted and rounded to the cent.
 */
function parseCents(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Price is not a finite number: ${value}`);
    }
    return toCents(value);
  }
  const match = DECIMAL_PRICE.exec(value.trim());
  if (!match) {
    throw new RangeError(`Price is not a decimal amount: "${value}"`);
  }
  const [, sign, whole = '0', fraction = ''] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  return sign ? -cents : cents;
}

/** Inverse of parseCents, suitable for a numeric(…, 2) column. */
function centsToDecimal(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

function lineExtensionCents(unitPriceCents: number, qty: number): number {
  return unitPriceCents * qty;
}

function sumCents(amounts: readonly number[]): number {
  return amounts.reduce((sum, amt) => sum + amt, 0);
}

function formatMoney(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const [whole = '0', fraction = '00'] = centsToDecimal(Math.abs(cents)).split('.');
  return `${sign}$${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}`;
}

export {
  toCents,
  toDollars,
  parseCents,
  centsToDecimal,
  lineExtensionCents,
  sumCents,
  formatMoney,
};
