/**
 * Role Extraction Templates
 */

import type { DocumentRole } from '../types';
import { BUDGET_TEMPLATE } from './budget.template';
import { CURRENT_TEMPLATE } from './current.template';
import { PRIOR_TEMPLATE } from './prior.template';
import { PRIOR_YEAR_TEMPLATE } from './prior-year.template';
import type { RoleTemplate } from './types';

export type { RoleTemplate } from './types';
export {
  BASE_SYSTEM_PROMPT,
  FIELD_GUIDE,
  FINANCIAL_STATEMENT_GUIDE,
  TABLE_GUIDE,
  TEXT_GUIDE,
  WORKED_EXAMPLE,
  retryInstructions,
} from './extraction-rules';
export { BUDGET_TEMPLATE, CURRENT_TEMPLATE, PRIOR_TEMPLATE, PRIOR_YEAR_TEMPLATE };

/**
 * Map of document roles to their extraction templates
 */
const TEMPLATES: Record<DocumentRole, RoleTemplate> = {
  current: CURRENT_TEMPLATE,
  prior: PRIOR_TEMPLATE,
  prior_year: PRIOR_YEAR_TEMPLATE,
  budget: BUDGET_TEMPLATE,
};

export function getTemplateForRole(role: DocumentRole): RoleTemplate {
  return TEMPLATES[role];
}
