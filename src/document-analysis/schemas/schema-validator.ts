import { plainToClass, ClassConstructor } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { AnalysisResultSchema } from './analysis-result.schema';
import { CategoryDecisionSchema } from './category-decision.schema';
import { ANALYSIS_RESULT_KEYS } from '../domain/entities/analysis-result.entity';
import { isRecord } from '../../utils/coerce.util';

function flattenErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}

/**
 * Validate a plain object against a schema class.
 * @returns list of violations, empty when the object is valid
 */
export function validateAgainst<T extends object>(
  schema: ClassConstructor<T>,
  value: unknown,
): string[] {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return ['<root>: must be an object'];
  }

  const instance = plainToClass(schema, value);
  return flattenErrors(validateSync(instance));
}

export const validateAnalysisResult = (value: unknown): string[] =>
  validateAgainst(AnalysisResultSchema, value);

export const validateCategoryDecision = (value: unknown): string[] =>
  validateAgainst(CategoryDecisionSchema, value);

/** Every top-level AnalysisResult key is present and non-null. */
export const hasAnalysisResultKeys = (value: unknown): boolean =>
  isRecord(value) &&
  ANALYSIS_RESULT_KEYS.every(
    (key) => value[key] !== undefined && value[key] !== null,
  );
