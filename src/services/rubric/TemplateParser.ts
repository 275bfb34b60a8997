/**
 * Rubric template parser: splits a combined raw document into instructions,
 * criteria (with scored items), question title/bullets and the answer block.
 *
 * Expected markers, each alone on a line:
 *   ===INSTRUCTIONS===  ===CRITERIA===  ===QUESTION===  ===ANSWER===
 * Criteria lines look like `CRITERIA 1: Content (0-5 marks)`,
 * item lines like `- Is it about the topic?  (0-2 marks)`.
 *
 * Parsing never throws. Lines that match nothing are dropped and unparseable
 * numbers become 0, so a zero index falls back to the criterion's position.
 */

import type { Criterion, ParsedTemplate, TemplateSection } from '../../types';

const SECTION_MARKERS = new Map<string, TemplateSection>([
  ['===INSTRUCTIONS===', 'INSTRUCTIONS'],
  ['===CRITERIA===', 'CRITERIA'],
  ['===QUESTION===', 'QUESTION'],
  ['===ANSWER===', 'ANSWER'],
]);

const CRITERION_HEADER = /^CRITERIA\s+(\d+):\s+(.*?)\s*\((?:0-)?([0-9]+(?:\.[0-9]+)?)\s+marks?\)\s*$/;
const CRITERION_ITEM = /^-\s+(.*?)\s*\((?:0-)?([0-9]+(?:\.[0-9]+)?)\s+marks?\)\s*$/;

const BULLET_PREFIXES = ['•', '-', '*'];

export function parseIntSafe(text: string): number {
  const n = parseInt(text, 10);
  return Number.isFinite(n) ? n : 0;
}

export function parseFloatSafe(text: string): number {
  const n = parseFloat(text);
  return Number.isFinite(n) ? n : 0;
}

function isBullet(line: string): boolean {
  return BULLET_PREFIXES.some((p) => line.startsWith(p));
}

function stripBullet(line: string): string {
  if (line.startsWith('•')) return line.slice(1).trim();
  return line.replace(/^[-* ]+/, '').trim();
}

export function parseRawTemplate(raw: string): ParsedTemplate {
  let section: TemplateSection | null = null;
  let instructions = '';
  let answer = '';
  let questionTitle = '';
  const questionBullets: string[] = [];
  const criteria: Criterion[] = [];
  let current: Criterion | null = null;

  for (const rawLine of raw.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    const trimmed = line.trim();

    const marker = SECTION_MARKERS.get(trimmed);
    if (marker) {
      section = marker;
      continue;
    }

    if (trimmed === '') {
      // blank lines only survive in free-text sections
      if (section === 'INSTRUCTIONS') instructions += '\n';
      else if (section === 'ANSWER') answer += '\n';
      continue;
    }

    switch (section) {
      case 'INSTRUCTIONS':
        if (instructions.length > 0) instructions += '\n';
        instructions += trimmed;
        break;

      case 'CRITERIA': {
        const header = CRITERION_HEADER.exec(trimmed);
        if (header) {
          if (current) criteria.push(current);
          current = {
            index: parseIntSafe(header[1]),
            title: header[2],
            maxScore: parseFloatSafe(header[3]),
            items: [],
          };
          break;
        }
        const item = CRITERION_ITEM.exec(trimmed);
        if (item && current) {
          current.items.push({ description: item[1], maxScore: parseFloatSafe(item[2]) });
        }
        break;
      }

      case 'QUESTION':
        // Only the first non-bullet line is the title; any later one is kept as a bullet.
        if (!isBullet(trimmed) && questionTitle === '') {
          questionTitle = trimmed;
        } else {
          questionBullets.push(isBullet(trimmed) ? stripBullet(trimmed) : trimmed);
        }
        break;

      case 'ANSWER':
        if (answer.length > 0) answer += '\n';
        answer += line;
        break;

      default:
        break;
    }
  }

  if (current) criteria.push(current);

  return {
    instructions: instructions.trim(),
    criteria,
    questionTitle,
    questionBullets,
    answer: answer.trim(),
  };
}
