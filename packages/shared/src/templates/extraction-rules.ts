/**
 * Shared extraction rules: the system prompt every role builds on, the field
 * guide generated from the catalogue, and the retry escalation blocks.
 */

import {
  FIELD_LABELS,
  INCOME_COMPONENT_FIELDS,
  MAIN_METRIC_FIELDS,
  OPEX_COMPONENT_FIELDS,
  type FinancialField,
} from '../fields';

function describeFields(fields: readonly FinancialField[]): string {
  return fields
    .map((field) => {
      const { label, synonyms } = FIELD_LABELS[field];
      return `- ${field} (${label}): also written as ${synonyms.map((s) => `"${s}"`).join(', ')}`;
    })
    .join('\n');
}

export const FIELD_GUIDE = `FIELDS TO EXTRACT

Main metrics:
${describeFields(MAIN_METRIC_FIELDS)}

Operating expense components:
${describeFields(OPEX_COMPONENT_FIELDS)}

Other income components:
${describeFields(INCOME_COMPONENT_FIELDS)}`;

export const BASE_SYSTEM_PROMPT = `You are a financial analyst extracting figures from real estate operating statements (T12s, rent roll summaries, budgets, profit and loss reports).

Return a single JSON object matching the schema. Every field must be present; use null when the document does not contain the figure.

${FIELD_GUIDE}

SIGN RULES:
- Amounts in parentheses are negative: (1,234.56) means -1234.56.
- A trailing or leading minus is negative: 1,234- and -1,234 both mean -1234.
- Report vacancy_loss, concessions and bad_debt as POSITIVE amounts even when the statement shows them as deductions.
- noi may be negative when expenses exceed income.

CALCULATION RULES:
- egi = gpr - vacancy_loss - concessions - bad_debt + other_income
- noi = egi - opex
- opex is the sum of the operating expense components when no total is printed.
- other_income is the sum of the other income components when no total is printed.
- Read printed totals as they are; only calculate a total the document does not print.

OUTPUT RULES:
- Strip currency symbols and thousands separators; return plain numbers.
- NEVER return an all-zero record when the document plainly contains nonzero figures.
- Do not invent figures. A missing line item is null, not 0.
- RETURN ONLY THE JSON OBJECT. No prose, no markdown fences.`;

export const FINANCIAL_STATEMENT_GUIDE = `DOCUMENT STRUCTURE:
The content is in FINANCIAL STATEMENT FORMAT. Under "LINE ITEMS:" each line reads "Category: value".
"SECTION:" lines are headings grouping the lines beneath them (for example income vs expenses).`;

export const TABLE_GUIDE = `DOCUMENT STRUCTURE:
The content contains tables. "COLUMN HEADERS:" names the columns and each row under "DATA ROWS:" lists the cells separated by " | ".
Find the line item label in the row and read the amount from the column for the period you are asked for.`;

export const TEXT_GUIDE = `DOCUMENT STRUCTURE:
The content is free text. Lines marked like [INCOME_SECTION] or [EXPENSE_SECTION] are headings; figures usually follow their labels on the same line.`;

export function retryInstructions(attempt: number, previousProblem: string | undefined): string {
  const problem = previousProblem ? ` The previous response was rejected: ${previousProblem}.` : '';
  return `IMPORTANT: This is retry attempt ${attempt}.${problem}
- Re-read the whole document before answering.
- DO NOT return all zero values. The figures are present in the content below.
- Every number must come from the document or from the calculation rules.
`;
}

export const WORKED_EXAMPLE = `WORKED EXAMPLE
Content:
  SECTION: Income
  Gross Potential Rent: 250000
  Vacancy Loss: (12,500)
  Parking Income: 3600
  Laundry Income: 1400
  SECTION: Expenses
  Property Taxes: 30000
  Insurance: 8000
  Repairs & Maintenance: 15000
  Total Operating Expenses: 53000

Correct output (fields not shown are null):
{"gpr": 250000, "vacancy_loss": 12500, "parking": 3600, "laundry": 1400, "other_income": 5000, "egi": 242500, "property_taxes": 30000, "insurance": 8000, "repairs_maintenance": 15000, "opex": 53000, "noi": 189500}
`;
