/**
 * Shared domain types for rubric templates.
 * Keeps API routes and rubric services aligned on the same shapes.
 */

/** A single scored bullet under a criterion. */
export interface CriterionItem {
  description: string;
  maxScore: number;
}

export interface Criterion {
  /** Display order (1-based). 0 means "derive from position in the document". */
  index: number;
  title: string;
  maxScore: number;
  items: CriterionItem[];
}

/** One self-contained template document per criterion; returned as-is in API responses. */
export interface CriterionTemplate {
  title: string;
  prompt: string;
  maxScore: number;
}

export interface ParsedTemplate {
  instructions: string;
  criteria: Criterion[];
  questionTitle: string;
  questionBullets: string[];
  answer: string;
}

export type TemplateSection = 'INSTRUCTIONS' | 'CRITERIA' | 'QUESTION' | 'ANSWER';
