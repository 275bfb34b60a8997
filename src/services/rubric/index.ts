export { parseRawTemplate, parseIntSafe, parseFloatSafe } from './TemplateParser';
export {
  buildCriterionTemplates,
  buildTemplatesForCriteria,
  renderCriterionTemplate,
  formatScore,
  normalizeBullets,
  orderCriteria,
  NoCriteriaError,
} from './TemplateBuilder';
export type { TemplateFrame } from './TemplateBuilder';
export { defaultB1Criteria, totalMaxScore } from './defaultCriteria';
