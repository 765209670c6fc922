export type StampUnit = 'hour' | 'second';

/**
 * UTC digits-only timestamp: `YYYYMMDDHHmmss`, or `YYYYMMDDHH` for the
 * hourly unit. Sorts lexically in time order.
 */
export function utcStamp(date: Date, unit: StampUnit = 'second'): string {
  const digits = date.toISOString().slice(0, 19).replace(/\D/g, '');
  return unit === 'hour' ? digits.slice(0, 10) : digits;
}
