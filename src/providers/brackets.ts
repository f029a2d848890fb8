/** Ownership-size tiers of the weekly distribution table, in shares. */
export const DISTRIBUTION_BRACKET_LABELS = [
  '1-999',
  '1,000-5,000',
  '5,001-10,000',
  '10,001-15,000',
  '15,001-20,000',
  '20,001-30,000',
  '30,001-40,000',
  '40,001-50,000',
  '50,001-100,000',
  '100,001-200,000',
  '200,001-400,000',
  '400,001-600,000',
  '600,001-800,000',
  '800,001-1,000,000',
  '1,000,001+',
] as const;

export const BRACKET_COUNT = DISTRIBUTION_BRACKET_LABELS.length;
