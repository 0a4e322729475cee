import { ValidationError } from '../errors.js';
import type {
  Filters,
  Payload,
  PayloadPrimitive,
  PayloadValue,
  RangeOperator,
} from './types.js';

export type ParsedCondition =
  | { kind: 'eq'; field: string; value: PayloadPrimitive }
  | { kind: 'range'; field: string; op: RangeOperator; value: number }
  | { kind: 'in'; field: string; values: PayloadPrimitive[] };

const RANGE_OPERATORS: readonly RangeOperator[] = ['$gte', '$lte', '$gt', '$lt'];

function isRangeOperator(op: string): op is RangeOperator {
  return (RANGE_OPERATORS as readonly string[]).includes(op);
}

function isPrimitive(value: unknown): value is PayloadPrimitive {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

/**
 * Validate a filter object and flatten it into a list of conditions.
 *
 * Filters usually arrive from callers assembling queries at runtime, so the
 * shape is checked here instead of trusted: unknown operators, non-numeric
 * range operands and non-array `$in` operands all raise ValidationError.
 */
export function parseFilters(filters: Filters | null | undefined): ParsedCondition[] {
  if (filters === null || filters === undefined) return [];
  if (typeof filters !== 'object' || Array.isArray(filters)) {
    throw new ValidationError('Filters must be an object');
  }

  const conditions: ParsedCondition[] = [];

  for (const [field, condition] of Object.entries(filters)) {
    if (field.length === 0) {
      throw new ValidationError('Filter field names must be non-empty');
    }

    if (isPrimitive(condition)) {
      if (typeof condition === 'number' && !Number.isFinite(condition)) {
        throw new ValidationError(`Filter on '${field}' must be a finite number`);
      }
      conditions.push({ kind: 'eq', field, value: condition });
      continue;
    }

    if (Array.isArray(condition) || typeof condition !== 'object') {
      throw new ValidationError(`Unsupported filter value for '${field}'; use $in for set membership`);
    }

    const entries = Object.entries(condition);
    if (entries.length === 0) {
      throw new ValidationError(`Empty operator object for '${field}'`);
    }

    for (const [op, operand] of entries) {
      if (isRangeOperator(op)) {
        if (typeof operand !== 'number' || !Number.isFinite(operand)) {
          throw new ValidationError(`Operator ${op} on '${field}' requires a finite number, got ${JSON.stringify(operand)}`);
        }
        conditions.push({ kind: 'range', field, op, value: operand });
      } else if (op === '$in') {
        if (!Array.isArray(operand) || !operand.every(isPrimitive)) {
          throw new ValidationError(`Operator $in on '${field}' requires an array of primitive values`);
        }
        conditions.push({ kind: 'in', field, values: [...operand] });
      } else {
        throw new ValidationError(`Unsupported filter operator '${op}' on '${field}'`);
      }
    }
  }

  return conditions;
}

function compareRange(op: RangeOperator, actual: number, bound: number): boolean {
  switch (op) {
    case '$gte':
      return actual >= bound;
    case '$lte':
      return actual <= bound;
    case '$gt':
      return actual > bound;
    case '$lt':
      return actual < bound;
  }
}

// Array payload values match when any element matches
function candidates(value: PayloadValue): PayloadValue[] {
  return Array.isArray(value) ? value : [value];
}

function matchesCondition(payload: Payload, condition: ParsedCondition): boolean {
  const actual = payload[condition.field];
  if (actual === undefined) return false;

  switch (condition.kind) {
    case 'eq':
      return candidates(actual).some((v) => v === condition.value);

    case 'in':
      return candidates(actual).some((v) => isPrimitive(v) && condition.values.includes(v));

    case 'range':
      return candidates(actual).some((v) => {
        if (typeof v !== 'number') {
          throw new ValidationError(
            `Cannot apply ${condition.op} to non-numeric value of '${condition.field}' (${typeof v})`
          );
        }
        return compareRange(condition.op, v, condition.value);
      });
  }
}

export function matchesFilters(payload: Payload, conditions: ParsedCondition[]): boolean {
  return conditions.every((condition) => matchesCondition(payload, condition));
}
