/**
 * Current Period Actuals Template
 *
 * Document semantics:
 * - Most recent actual results (a month, a quarter, or trailing twelve months)
 * - Statements often show several period columns; the current period or the
 *   total/YTD column is the one to report
 */

import type { RoleTemplate } from './types';
import { USER_PROMPT_TEMPLATE } from './shared-user-prompt';

export const CURRENT_TEMPLATE: RoleTemplate = {
  documentRole: 'current',
  description: 'Current period actual operating statement',

  systemPrompt: `DOCUMENT ROLE: CURRENT PERIOD ACTUALS
This is the most recent ACTUAL operating statement for the property.
- Report actual results, not budget or forecast columns.
- When monthly columns and a total/YTD column are both present, report the total/YTD column.
- When "Current Month" and "Year to Date" are both present, report "Current Month".`,

  userPromptTemplate: USER_PROMPT_TEMPLATE,
};
