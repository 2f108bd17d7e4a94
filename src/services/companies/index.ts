/**
 * Companies module - respondent company name from the header or from
 * recognized entities.
 */

export {
  companyFromEntities,
  companyFromSection,
  nameSimilarity,
} from './companyName';
export type {
  CompanyMatchOptions,
  EntityRecognizer,
  NamedEntity,
} from './company.types';
export { COMPANY_CONFIG } from './company.types';
