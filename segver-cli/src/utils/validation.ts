import { throwValidationError } from './errors.js';

export const RELATIONS = ['gt', 'ge', 'lt', 'le', 'eq'] as const;

export type Relation = (typeof RELATIONS)[number];

export function validateRelation(value: string): Relation {
  const relation = RELATIONS.find((candidate) => candidate === value.toLowerCase());
  if (!relation) {
    throwValidationError(
      `Invalid relation: ${value}`,
      `Use one of: ${RELATIONS.join(', ')}`
    );
  }
  return relation;
}
