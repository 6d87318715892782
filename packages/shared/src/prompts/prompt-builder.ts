/**
 * PromptBuilder
 *
 * Composes the system and user prompts for one extraction attempt from the
 * content, the document role and the attempt strategy. Later attempts are
 * more explicit: attempt 2 repeats the no-all-zero constraint, attempt 3 also
 * carries a worked example.
 */

import { createHash } from 'node:crypto';
import { config } from '../config';
import {
  BASE_SYSTEM_PROMPT,
  FINANCIAL_STATEMENT_GUIDE,
  TABLE_GUIDE,
  TEXT_GUIDE,
  WORKED_EXAMPLE,
  getTemplateForRole,
  retryInstructions,
} from '../templates';
import type { DocumentRole, PreprocessedContent } from '../types';

export const PROMPT_VERSION = '1.2.0';

export type PromptStrategyName = 'standard' | 'reinforced' | 'worked_example';

export interface AttemptStrategy {
  name: PromptStrategyName;
  temperature: number;
  includeRetryInstructions: boolean;
  includeWorkedExample: boolean;
}

export const ATTEMPT_STRATEGIES: readonly AttemptStrategy[] = [
  { name: 'standard', temperature: 0, includeRetryInstructions: false, includeWorkedExample: false },
  { name: 'reinforced', temperature: 0.1, includeRetryInstructions: true, includeWorkedExample: false },
  { name: 'worked_example', temperature: 0.2, includeRetryInstructions: true, includeWorkedExample: true },
];

/**
 * Strategy for a 1-based attempt number. Attempts past the table reuse the
 * most explicit strategy.
 */
export function strategyForAttempt(attempt: number): AttemptStrategy {
  const index = Math.min(Math.max(attempt, 1), ATTEMPT_STRATEGIES.length) - 1;
  return ATTEMPT_STRATEGIES[index];
}

const ROLE_NAMES: Record<DocumentRole, string> = {
  current: 'current period actuals',
  prior: 'prior period actuals',
  prior_year: 'prior year actuals',
  budget: 'budget',
};

export interface BuiltPrompt {
  promptId: string;
  systemPrompt: string;
  userPrompt: string;
  strategy: AttemptStrategy;
  truncated: boolean;
}

export interface PromptOptions {
  /** Why the previous attempt was rejected, echoed into the retry block */
  previousProblem?: string;
  maxChars?: number;
}

/**
 * Keep the head (70%) and the tail of over-long content: statement totals
 * usually sit at the end.
 */
export function truncateContent(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) return { text, truncated: false };
  const headChars = Math.floor(maxChars * 0.7);
  const tailChars = maxChars - headChars;
  const omitted = text.length - headChars - tailChars;
  return {
    text: `${text.slice(0, headChars)}\n[... ${omitted} CHARACTERS OMITTED ...]\n${text.slice(text.length - tailChars)}`,
    truncated: true,
  };
}

/**
 * Single-pass placeholder substitution; inserted values are not rescanned.
 */
function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}

function structureGuide(content: PreprocessedContent): string {
  if (content.isFinancialStatement && content.format !== 'txt') return FINANCIAL_STATEMENT_GUIDE;
  if (content.metadata.tableCount > 0) return TABLE_GUIDE;
  return TEXT_GUIDE;
}

export function buildPrompt(
  content: PreprocessedContent,
  role: DocumentRole,
  attempt: number,
  options: PromptOptions = {}
): BuiltPrompt {
  const strategy = strategyForAttempt(attempt);
  const template = getTemplateForRole(role);
  const { text, truncated } = truncateContent(content.text, options.maxChars ?? config.maxPromptChars);

  let escalation = '';
  if (strategy.includeRetryInstructions) {
    escalation += `\n${retryInstructions(attempt, options.previousProblem)}`;
  }
  if (strategy.includeWorkedExample) {
    escalation += `\n${WORKED_EXAMPLE}`;
  }

  const systemPrompt = `${BASE_SYSTEM_PROMPT}\n\n${template.systemPrompt}`;
  const userPrompt = fillTemplate(template.userPromptTemplate, {
    role_name: ROLE_NAMES[role],
    filename: content.metadata.filename,
    structure_guide: structureGuide(content),
    retry_instructions: escalation,
    content: text,
  });

  const digest = createHash('sha256').update(systemPrompt).update(userPrompt).digest('hex').slice(0, 12);

  return {
    promptId: `${PROMPT_VERSION}/${role}/${strategy.name}/${digest}`,
    systemPrompt,
    userPrompt,
    strategy,
    truncated,
  };
}
