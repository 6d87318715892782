/**
 * Budget Template
 *
 * Document semantics:
 * - Projected figures for a future or current period, not actual results
 * - Budget-vs-actual reports carry both; only the budget column belongs here
 */

import type { RoleTemplate } from './types';
import { USER_PROMPT_TEMPLATE } from './shared-user-prompt';

export const BUDGET_TEMPLATE: RoleTemplate = {
  documentRole: 'budget',
  description: 'Budgeted or projected operating statement',

  systemPrompt: `DOCUMENT ROLE: BUDGET
This is a BUDGET: projected figures, not actual results.
- Report the budgeted amounts.
- On budget-vs-actual reports, report the BUDGET column and ignore actual and variance columns.
- Annual budgets split by month: report the annual total.`,

  userPromptTemplate: USER_PROMPT_TEMPLATE,
};
