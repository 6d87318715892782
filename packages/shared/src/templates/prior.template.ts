/**
 * Prior Period Actuals Template
 */

import type { RoleTemplate } from './types';
import { USER_PROMPT_TEMPLATE } from './shared-user-prompt';

export const PRIOR_TEMPLATE: RoleTemplate = {
  documentRole: 'prior',
  description: 'Prior period actual operating statement',

  systemPrompt: `DOCUMENT ROLE: PRIOR PERIOD ACTUALS
This is the ACTUAL operating statement for the period before the current one.
- Report historical actual results.
- If the document also shows the current period side by side, report the PRIOR period column.`,

  userPromptTemplate: USER_PROMPT_TEMPLATE,
};
