/**
 * Canonical Schema
 *
 * The fixed set of field names every mapped bordereau row is converted into,
 * with the value type each one is normalized to.
 */

export const CANONICAL_FIELDS = [
  'policy_number',
  'insured_name',
  'broker_name',
  'product_type',
  'coverage_type',
  'risk_location',
  'inception_date',
  'expiry_date',
  'premium_amount',
  'claim_amount',
  'commission_amount',
  'net_premium',
  'currency',
] as const;

export type CanonicalField = typeof CANONICAL_FIELDS[number];

/**
 * - string: trimmed, case preserved
 * - date: ISO 8601 calendar date (yyyy-MM-dd)
 * - decimal: exact decimal string, e.g. "-1234.50"
 * - currency: ISO 4217 code
 */
export type CanonicalValueType = 'string' | 'date' | 'decimal' | 'currency';

export const CANONICAL_FIELD_TYPES: Record<CanonicalField, CanonicalValueType> = {
  policy_number: 'string',
  insured_name: 'string',
  broker_name: 'string',
  product_type: 'string',
  coverage_type: 'string',
  risk_location: 'string',
  inception_date: 'date',
  expiry_date: 'date',
  premium_amount: 'decimal',
  claim_amount: 'decimal',
  commission_amount: 'decimal',
  net_premium: 'decimal',
  currency: 'currency',
};

export const CANONICAL_FIELD_LABELS: Record<CanonicalField, string> = {
  policy_number: 'Policy Number',
  insured_name: 'Insured Name',
  broker_name: 'Broker Name',
  product_type: 'Product Type',
  coverage_type: 'Coverage Type',
  risk_location: 'Risk Location',
  inception_date: 'Inception Date',
  expiry_date: 'Expiry Date',
  premium_amount: 'Premium Amount',
  claim_amount: 'Claim Amount',
  commission_amount: 'Commission Amount',
  net_premium: 'Net Premium',
  currency: 'Currency',
};

export function isCanonicalField(value: string): value is CanonicalField {
  return CANONICAL_FIELDS.some((field) => field === value);
}
