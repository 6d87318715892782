/**
 * Prompt construction unit tests
 */

import { buildPrompt, strategyForAttempt, truncateContent } from '@noi-extract/shared';
import { preprocessed } from './helpers';

const STATEMENT = 'TEXT DOCUMENT: statement.txt\nGross Potential Rent: 250,000\n[DOCUMENT_END]';

describe('strategyForAttempt', () => {
  it('should escalate through the strategies', () => {
    expect(strategyForAttempt(1)).toMatchObject({ name: 'standard', temperature: 0 });
    expect(strategyForAttempt(2)).toMatchObject({ name: 'reinforced', temperature: 0.1 });
    expect(strategyForAttempt(3)).toMatchObject({ name: 'worked_example', temperature: 0.2 });
  });

  it('should clamp attempts outside the table', () => {
    expect(strategyForAttempt(0).name).toBe('standard');
    expect(strategyForAttempt(7).name).toBe('worked_example');
  });
});

describe('truncateContent', () => {
  it('should leave short content alone', () => {
    expect(truncateContent('short', 20)).toEqual({ text: 'short', truncated: false });
  });

  it('should keep the head and the tail of long content', () => {
    expect(truncateContent('a'.repeat(100), 10)).toEqual({
      text: 'aaaaaaa\n[... 90 CHARACTERS OMITTED ...]\naaa',
      truncated: true,
    });
  });
});

describe('buildPrompt', () => {
  it('should build the first attempt from the role template', () => {
    const prompt = buildPrompt(preprocessed(STATEMENT), 'budget', 1);

    expect(prompt.promptId).toMatch(/^1\.2\.0\/budget\/standard\/[0-9a-f]{12}$/);
    expect(prompt.systemPrompt).toContain('DOCUMENT ROLE: BUDGET');
    expect(prompt.systemPrompt).toContain('RETURN ONLY THE JSON OBJECT.');
    expect(prompt.userPrompt).toContain('- role: budget');
    expect(prompt.userPrompt).toContain(`DOCUMENT CONTENT:\n${STATEMENT}`);
    expect(prompt.userPrompt).not.toContain('retry attempt');
    expect(prompt.truncated).toBe(false);
  });

  it('should repeat the rejection reason on the second attempt', () => {
    const prompt = buildPrompt(preprocessed(STATEMENT), 'current', 2, {
      previousProblem: 'Every primary metric (gpr, egi, opex, noi) was zero or null',
    });

    expect(prompt.strategy.name).toBe('reinforced');
    expect(prompt.userPrompt).toContain(
      'IMPORTANT: This is retry attempt 2. The previous response was rejected: Every primary metric (gpr, egi, opex, noi) was zero or null.'
    );
    expect(prompt.userPrompt).not.toContain('WORKED EXAMPLE');
  });

  it('should add the worked example on the third attempt', () => {
    const prompt = buildPrompt(preprocessed(STATEMENT), 'current', 3);

    expect(prompt.userPrompt).toContain('IMPORTANT: This is retry attempt 3.');
    expect(prompt.userPrompt).toContain('WORKED EXAMPLE');
  });

  it('should describe the layout of the content', () => {
    const statement = buildPrompt(preprocessed(STATEMENT, { format: 'csv', isFinancialStatement: true }), 'current', 1);
    const text = buildPrompt(preprocessed(STATEMENT), 'current', 1);

    expect(statement.userPrompt).toContain('The content is in FINANCIAL STATEMENT FORMAT.');
    expect(text.userPrompt).toContain('The content is free text.');
  });

  it('should give identical inputs identical prompt ids', () => {
    const first = buildPrompt(preprocessed(STATEMENT), 'prior', 1);
    const second = buildPrompt(preprocessed(STATEMENT), 'prior', 1);
    const other = buildPrompt(preprocessed(`${STATEMENT}\nNet Operating Income: 1,000`), 'prior', 1);

    expect(second.promptId).toBe(first.promptId);
    expect(other.promptId).not.toBe(first.promptId);
  });

  it('should truncate content beyond the character limit', () => {
    const prompt = buildPrompt(preprocessed('x'.repeat(500)), 'current', 1, { maxChars: 100 });

    expect(prompt.truncated).toBe(true);
    expect(prompt.userPrompt).toContain('[... 400 CHARACTERS OMITTED ...]');
  });
});
