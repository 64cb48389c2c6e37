import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError as FieldError, validateSync } from 'class-validator';
import { UpstreamParseError } from '../../common/errors';
import { errorMessage } from '../../common/utils';

interface FieldProblem {
  path: string;
  missing: boolean;
}

function collectProblems(errors: FieldError[], parent: string, out: FieldProblem[]) {
  for (const error of errors) {
    const path = parent ? `${parent}.${error.property}` : error.property;
    if (error.constraints) {
      out.push({ path, missing: 'isDefined' in error.constraints });
    }
    if (error.children?.length) {
      collectProblems(error.children, path, out);
    }
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Validates an already-decoded upstream value against a DTO class. A missing
 * field is reported as `missing_field`; anything present with the wrong
 * shape as `unexpected_type`.
 */
export function parseUpstreamValue<T extends object>(cls: ClassConstructor<T>, plain: unknown): T {
  if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
    throw new UpstreamParseError('unexpected_type', `expected a JSON object, got ${describeType(plain)}`);
  }

  const instance = plainToInstance(cls, plain);
  const problems: FieldProblem[] = [];
  collectProblems(validateSync(instance), '', problems);

  const missing = problems.filter((p) => p.missing).map((p) => p.path);
  if (missing.length > 0) {
    throw new UpstreamParseError('missing_field', `missing field ${missing.join(', ')}`);
  }
  if (problems.length > 0) {
    throw new UpstreamParseError(
      'unexpected_type',
      `unexpected type for ${problems.map((p) => p.path).join(', ')}`,
    );
  }
  return instance;
}

export function parseUpstreamJson<T extends object>(cls: ClassConstructor<T>, raw: string): T {
  let plain: unknown;
  try {
    plain = JSON.parse(raw);
  } catch (error) {
    throw new UpstreamParseError('malformed_json', `malformed JSON, ${errorMessage(error)}`);
  }
  return parseUpstreamValue(cls, plain);
}
