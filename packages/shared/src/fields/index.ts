/**
 * Financial Field Catalogue
 *
 * The closed set of fields in a FinancialRecord, the synonym table used by the
 * prompt builder, the response parser and the pattern extractor, and label
 * normalization shared by all three.
 */

import fieldLabels from './field-labels.json';

export const MAIN_METRIC_FIELDS = [
  'gpr',
  'vacancy_loss',
  'concessions',
  'bad_debt',
  'other_income',
  'egi',
  'opex',
  'noi',
] as const;

export const OPEX_COMPONENT_FIELDS = [
  'property_taxes',
  'insurance',
  'repairs_maintenance',
  'utilities',
  'management_fees',
  'administrative',
  'payroll',
  'marketing',
  'other_expenses',
] as const;

export const INCOME_COMPONENT_FIELDS = [
  'parking',
  'laundry',
  'late_fees',
  'pet_fees',
  'application_fees',
  'storage_fees',
  'amenity_fees',
  'utility_reimbursements',
  'cleaning_fees',
  'cancellation_fees',
  'miscellaneous',
] as const;

export const FINANCIAL_FIELDS = [
  ...MAIN_METRIC_FIELDS,
  ...OPEX_COMPONENT_FIELDS,
  ...INCOME_COMPONENT_FIELDS,
] as const;

export type FinancialField = (typeof FINANCIAL_FIELDS)[number];

export type FinancialRecord = Record<FinancialField, number | null>;

/** Fields whose presence (nonzero) makes a record acceptable */
export const PRIMARY_METRICS: readonly FinancialField[] = ['gpr', 'egi', 'opex', 'noi'];

/** Net results that may legitimately be negative */
export const SIGNED_FIELDS: ReadonlySet<FinancialField> = new Set<FinancialField>(['noi']);

export interface FieldLabel {
  label: string;
  description: string;
  synonyms: string[];
}

export const FIELD_LABELS: Record<FinancialField, FieldLabel> = fieldLabels;

const FIELD_SET: ReadonlySet<string> = new Set<string>(FINANCIAL_FIELDS);

export function isFinancialField(value: string): value is FinancialField {
  return FIELD_SET.has(value);
}

/**
 * Build a value for every field, in catalogue order.
 */
export function mapFields<T>(build: (field: FinancialField) => T): Record<FinancialField, T> {
  return {
    gpr: build('gpr'),
    vacancy_loss: build('vacancy_loss'),
    concessions: build('concessions'),
    bad_debt: build('bad_debt'),
    other_income: build('other_income'),
    egi: build('egi'),
    opex: build('opex'),
    noi: build('noi'),
    property_taxes: build('property_taxes'),
    insurance: build('insurance'),
    repairs_maintenance: build('repairs_maintenance'),
    utilities: build('utilities'),
    management_fees: build('management_fees'),
    administrative: build('administrative'),
    payroll: build('payroll'),
    marketing: build('marketing'),
    other_expenses: build('other_expenses'),
    parking: build('parking'),
    laundry: build('laundry'),
    late_fees: build('late_fees'),
    pet_fees: build('pet_fees'),
    application_fees: build('application_fees'),
    storage_fees: build('storage_fees'),
    amenity_fees: build('amenity_fees'),
    utility_reimbursements: build('utility_reimbursements'),
    cleaning_fees: build('cleaning_fees'),
    cancellation_fees: build('cancellation_fees'),
    miscellaneous: build('miscellaneous'),
  };
}

export function emptyRecord(): FinancialRecord {
  return mapFields(() => null);
}

/**
 * Lowercase, spell out '&', fold separators to spaces and collapse runs of
 * whitespace. Hyphens inside words are kept ("move-in", "write-offs").
 */
export function normalizeLabel(text: string): string {
  return text
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[–—]/g, '-')
    .replace(/[^a-z0-9-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

interface LabelVariant {
  field: FinancialField;
  variant: string;
  pattern: RegExp;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildVariants(): LabelVariant[] {
  const seen = new Set<string>();
  const variants: LabelVariant[] = [];
  for (const field of FINANCIAL_FIELDS) {
    const candidates = [...FIELD_LABELS[field].synonyms, FIELD_LABELS[field].label, field];
    for (const candidate of candidates) {
      const variant = normalizeLabel(candidate);
      if (!variant || seen.has(variant)) continue;
      seen.add(variant);
      variants.push({
        field,
        variant,
        pattern: new RegExp(`(?<![a-z0-9])${escapeRegExp(variant)}(?![a-z0-9])`),
      });
    }
  }
  return variants.sort((a, b) => b.variant.length - a.variant.length);
}

const LABEL_VARIANTS = buildVariants();

const VARIANT_LOOKUP: ReadonlyMap<string, FinancialField> = new Map(
  LABEL_VARIANTS.map((entry) => [entry.variant, entry.field])
);

export interface LabelMatch {
  field: FinancialField;
  variant: string;
}

/**
 * Find the field whose longest label variant occurs in the text.
 */
export function matchFieldLabel(text: string): LabelMatch | null {
  const normalized = normalizeLabel(text);
  if (!normalized) return null;
  for (const entry of LABEL_VARIANTS) {
    if (entry.pattern.test(normalized)) {
      return { field: entry.field, variant: entry.variant };
    }
  }
  return null;
}

/**
 * Whether the text contains the given label variant (already normalized).
 */
export function containsLabelVariant(text: string, variant: string): boolean {
  const entry = LABEL_VARIANTS.find((candidate) => candidate.variant === variant);
  return entry !== undefined && entry.pattern.test(normalizeLabel(text));
}

/**
 * Map a key as a model might spell it ("Gross_Potential_Rent", "NOI",
 * "total operating expenses") onto its canonical field.
 */
export function resolveFieldKey(key: string): FinancialField | null {
  if (isFinancialField(key)) return key;
  return VARIANT_LOOKUP.get(normalizeLabel(key)) ?? null;
}

/** Words that mark a line or category as financial statement content */
export const FINANCIAL_KEYWORDS: readonly string[] = [
  'rent',
  'rental',
  'income',
  'revenue',
  'vacancy',
  'concessions',
  'expense',
  'expenses',
  'taxes',
  'insurance',
  'utilities',
  'maintenance',
  'repairs',
  'management',
  'payroll',
  'operating',
  'noi',
  'egi',
  'fees',
  'debt',
  'parking',
  'laundry',
];

const KEYWORD_SET: ReadonlySet<string> = new Set(FINANCIAL_KEYWORDS);

export function hasFinancialKeyword(text: string): boolean {
  const words = normalizeLabel(text).split(' ');
  return words.some((word) => KEYWORD_SET.has(word)) || matchFieldLabel(text) !== null;
}
