/**
 * Reference B1 writing rubric: three criteria worth 5 marks each (15 total).
 */

import type { Criterion } from '../../types';

const B1_CRITERIA: readonly Criterion[] = [
  {
    index: 1,
    title: 'Content',
    maxScore: 5,
    items: [
      { description: 'Is it about the topic stated in the task?', maxScore: 1 },
      {
        description: 'Does it address all the notes mentioned in the task? Or does it answer the question(s) in the task?',
        maxScore: 2,
      },
      { description: 'Are the answers of an appropriate length for the task?', maxScore: 2 },
    ],
  },
  {
    index: 2,
    title: 'Communicative Achievement & Organization',
    maxScore: 5,
    items: [
      { description: 'Does the text use appropriate language and phrases to respond to all the notes?', maxScore: 2 },
      { description: 'Are the ideas presented in a logical order?', maxScore: 1 },
      {
        description:
          'Does the text use a variety of linking words or cohesive devices (such as although, and, but, because, so that, whether etc., and referencing language)?',
        maxScore: 1,
      },
      {
        description: 'Is the purpose of the answer clear (e.g., agreeing, disagreeing, giving opinion, explaining)?',
        maxScore: 1,
      },
    ],
  },
  {
    index: 3,
    title: 'Language Grammar and Vocabulary',
    maxScore: 5,
    items: [
      { description: 'Does the text use a range of vocabulary?', maxScore: 1.5 },
      { description: 'Does the text use simple grammar accurately (e.g., basic tenses and simple clauses)?', maxScore: 1 },
      {
        description:
          'Does it use some complex grammatical structures (such as relative clauses, passives, modal forms and tense contrasts)?',
        maxScore: 1.5,
      },
      { description: 'Is the spelling accurate enough for the meaning to be clear?', maxScore: 1 },
    ],
  },
];

/** Fresh copy on every call so callers may mutate the result. */
export function defaultB1Criteria(): Criterion[] {
  return B1_CRITERIA.map((c) => ({ ...c, items: c.items.map((item) => ({ ...item })) }));
}

export function totalMaxScore(criteria: Criterion[]): number {
  return criteria.reduce((sum, c) => sum + c.maxScore, 0);
}
