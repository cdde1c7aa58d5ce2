type Unit = {
  ms: number;
  singular: string;
  plural: string;
};

const MILLISECOND: Unit = { ms: 1, singular: 'millisecond', plural: 'milliseconds' };
const YEAR: Unit = { ms: 31_556_952_000, singular: 'year', plural: 'years' };

const UNITS: readonly Unit[] = [
  MILLISECOND,
  { ms: 1_000, singular: 'second', plural: 'seconds' },
  { ms: 60_000, singular: 'minute', plural: 'minutes' },
  { ms: 3_600_000, singular: 'hour', plural: 'hours' },
  { ms: 86_400_000, singular: 'day', plural: 'days' },
  { ms: 604_800_000, singular: 'week', plural: 'weeks' },
  { ms: 2_629_746_000, singular: 'month', plural: 'months' },
  YEAR
];

/**
 * Prints fewer decimals as the quantity grows and drops trailing zeros.
 */
export const formatQuantity = (quantity: number): string => {
  const digits =
    quantity < 0.001 ? 6 : quantity < 0.01 ? 5 : quantity < 0.1 ? 4 : quantity < 1 ? 3 : quantity < 10 ? 2 : quantity < 100 ? 1 : 0;
  const fixed = quantity.toFixed(digits);

  if (!fixed.includes('.')) {
    return fixed;
  }

  return fixed.replace(/0+$/, '').replace(/\.$/, '');
};

/**
 * Human-readable duration, e.g. `1.5 seconds` or `3 hours`.
 */
export const durationToString = (durationMs: number): string => {
  const unit = [...UNITS].reverse().find((candidate) => durationMs >= candidate.ms) ?? MILLISECOND;
  const quantity = formatQuantity(durationMs / unit.ms);
  return `${quantity} ${quantity === '1' ? unit.singular : unit.plural}`;
};

/**
 * Human-readable rate using the smallest unit in which more than one event occurs,
 * e.g. `10 requests per second`.
 */
export const rateToString = (
  count: number,
  durationMs: number,
  singular = 'request',
  plural = 'requests'
): string => {
  const unit = UNITS.find((candidate) => (count * candidate.ms) / durationMs > 1) ?? YEAR;
  const quantity = formatQuantity((count * unit.ms) / durationMs);
  return `${quantity} ${quantity === '1' ? singular : plural} per ${unit.singular}`;
};
