/**
 * Rubric template builder: turns one combined raw document into one standalone
 * template per criterion. Each output keeps the shared instructions, question and
 * answer sections and carries only its own criterion's scoring block.
 */

import type { Criterion, CriterionTemplate, ParsedTemplate } from '../../types';
import { parseRawTemplate } from './TemplateParser';

export class NoCriteriaError extends Error {
  constructor() {
    super('no criteria parsed');
    this.name = 'NoCriteriaError';
  }
}

/** Shared (non-criteria) parts every rendered template repeats. */
export type TemplateFrame = Pick<ParsedTemplate, 'instructions' | 'questionTitle' | 'questionBullets' | 'answer'>;

/** 5 → "5", 1.5 → "1.5", 1.25 → "1.25", 2.00 → "2". */
export function formatScore(score: number): string {
  if (Number.isInteger(score)) return score.toFixed(0);
  return score
    .toFixed(2)
    .replace(/0+$/, '')
    .replace(/\.$/, '');
}

export function normalizeBullets(bullets: string[]): string[] {
  return bullets.map((b) => b.trim().replace(/^[•\-* \t]+/, '')).filter((b) => b !== '');
}

/**
 * Stable sort by explicit index, falling back to the 1-based position for
 * criteria without one. Ties keep document order.
 */
export function orderCriteria(criteria: Criterion[]): { order: number; criterion: Criterion }[] {
  return criteria
    .map((criterion, i) => ({ order: criterion.index !== 0 ? criterion.index : i + 1, criterion }))
    .sort((a, b) => a.order - b.order);
}

export function renderCriterionTemplate(frame: TemplateFrame, criterion: Criterion, order: number): string {
  const lines: string[] = [];
  lines.push('===INSTRUCTIONS===', frame.instructions.trim());
  lines.push('===CRITERIA===');
  lines.push(`CRITERIA ${order}: ${criterion.title} (0-${formatScore(criterion.maxScore)} marks)`);
  for (const item of criterion.items) {
    lines.push(`- ${item.description}  (0-${formatScore(item.maxScore)} marks)`);
  }
  lines.push('===QUESTION===');
  if (frame.questionTitle !== '') lines.push(frame.questionTitle);
  for (const bullet of frame.questionBullets) {
    lines.push(`• ${bullet}`);
  }
  lines.push('===ANSWER===');
  return lines.join('\n') + '\n' + frame.answer;
}

/** Renders one template per criterion in display order. */
export function buildTemplatesForCriteria(frame: TemplateFrame, criteria: Criterion[]): CriterionTemplate[] {
  const normalized: TemplateFrame = { ...frame, questionBullets: normalizeBullets(frame.questionBullets) };
  return orderCriteria(criteria).map(({ order, criterion }) => ({
    title: criterion.title,
    prompt: renderCriterionTemplate(normalized, criterion, order),
    maxScore: criterion.maxScore,
  }));
}

export function buildCriterionTemplates(raw: string): CriterionTemplate[] {
  const parsed = parseRawTemplate(raw);
  if (parsed.criteria.length === 0) {
    throw new NoCriteriaError();
  }
  return buildTemplatesForCriteria(parsed, parsed.criteria);
}
