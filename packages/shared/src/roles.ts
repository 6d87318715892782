/**
 * Document Roles
 *
 * Resolves the period a document represents when the uploader omits it or
 * spells it differently ("current_month", "Prior Month", "PY").
 */

import { DOCUMENT_ROLES, type DocumentRole } from './types';

const ROLE_ALIASES: Record<string, DocumentRole> = {
  current: 'current',
  current_month: 'current',
  current_period: 'current',
  actual: 'current',
  actuals: 'current',
  prior: 'prior',
  prior_month: 'prior',
  prior_period: 'prior',
  previous: 'prior',
  previous_month: 'prior',
  budget: 'budget',
  budgeted: 'budget',
  forecast: 'budget',
  prior_year: 'prior_year',
  previous_year: 'prior_year',
  last_year: 'prior_year',
  py: 'prior_year',
};

function isDocumentRole(value: string): value is DocumentRole {
  return DOCUMENT_ROLES.some((role) => role === value);
}

/**
 * Canonical role for a caller-supplied value, or null when it names no role.
 */
export function normalizeDocumentRole(value: string): DocumentRole | null {
  const key = value
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_');
  if (isDocumentRole(key)) return key;
  return ROLE_ALIASES[key] ?? null;
}

/**
 * Role implied by a filename: budget files, prior-year files, prior-period
 * files, otherwise the current period.
 */
export function inferDocumentRole(filename: string): DocumentRole {
  const name = filename.toLowerCase();
  if (/budget|forecast/.test(name)) return 'budget';
  if (/(prior|previous|last)[\s_-]*year|(^|[^a-z])py([^a-z]|$)/.test(name)) return 'prior_year';
  if (/prior|previous/.test(name)) return 'prior';
  return 'current';
}
