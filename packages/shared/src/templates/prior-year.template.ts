/**
 * Prior Year Actuals Template
 *
 * Document semantics:
 * - Same period one year earlier, used for year-over-year comparison
 * - Comparative statements often put this year and last year side by side
 */

import type { RoleTemplate } from './types';
import { USER_PROMPT_TEMPLATE } from './shared-user-prompt';

export const PRIOR_YEAR_TEMPLATE: RoleTemplate = {
  documentRole: 'prior_year',
  description: 'Same period of the prior year, actual results',

  systemPrompt: `DOCUMENT ROLE: PRIOR YEAR ACTUALS
This is the ACTUAL operating statement for the same period of the PREVIOUS YEAR.
- Report historical actual results for the prior year.
- On comparative statements with a current year and a prior year column, report the PRIOR YEAR column.`,

  userPromptTemplate: USER_PROMPT_TEMPLATE,
};
