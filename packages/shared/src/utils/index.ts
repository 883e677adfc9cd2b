export { generateUlid, generateUlidAt, isValidUlid, ulidTimestamp } from './ulid';
export {
  toCents,
  toDollars,
  parseCents,
  centsToDecimal,
  lineExtensionCents,
  sumCents,
  formatMoney,
} from './money';
export { toIsoDate, startOfUtcDay, addUtcDays, diffUtcDays, atUtcTime } from './date';
