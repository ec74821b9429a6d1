import { ValidationError } from '../errors/QueryBuilderError';

/**
 * Validates IRIs written as SPARQL IRIREF tokens (`<...>`)
 */
export class IriValidator {
  private static readonly SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;
  // Characters the IRIREF production excludes
  private static readonly DISALLOWED_CHARS = /[\x00-\x20<>"{}|\\^`]/;

  public static validateIri(iri: string): void {
    if (iri.trim() === '') {
      throw new ValidationError('Invalid IRI: must be a non-empty string', { iri });
    }

    if (IriValidator.DISALLOWED_CHARS.test(iri)) {
      throw new ValidationError('Invalid IRI: contains disallowed characters', { iri });
    }

    // Relative IRIs need a BASE, which queries built here never declare
    if (!IriValidator.SCHEME_PATTERN.test(iri)) {
      throw new ValidationError('Invalid IRI: missing or invalid scheme', { iri });
    }
  }
}

/**
 * Validates SPARQL variable names (the VARNAME production, without the `?` or `$` sigil)
 */
export class VariableNameValidator {
  private static readonly VARNAME_PATTERN = /^[\p{L}_0-9][\p{L}_0-9\u00B7\u0300-\u036F\u203F-\u2040]*$/u;

  public static validateName(name: string): void {
    if (!VariableNameValidator.VARNAME_PATTERN.test(name)) {
      throw new ValidationError(`Invalid variable name: "${name}"`, { name });
    }
  }

  /**
   * Strip a leading `?` or `$` and validate what remains
   */
  public static normalize(name: string): string {
    const bare = name.startsWith('?') || name.startsWith('$') ? name.slice(1) : name;
    VariableNameValidator.validateName(bare);
    return bare;
  }
}

/**
 * Converts OFFSET and LIMIT arguments to integers
 */
export class SliceValidator {
  private static readonly LEADING_INTEGER = /^\s*([+-]?\d+)/;
  private static readonly DIGITS = /^\d+$/;

  /**
   * Best-effort conversion: numbers truncate toward zero, strings use their
   * leading integer, bigints convert when they fit a safe integer, anything
   * else becomes 0.
   */
  public static toInteger(value: unknown): number {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? Math.trunc(value) || 0 : 0;
    }
    if (typeof value === 'bigint') {
      const converted = Number(value);
      return Number.isSafeInteger(converted) ? converted : 0;
    }
    if (typeof value === 'string') {
      const match = SliceValidator.LEADING_INTEGER.exec(value);
      return match ? parseInt(match[1], 10) || 0 : 0;
    }
    return 0;
  }

  /**
   * Accepts only non-negative safe integers, given as numbers, bigints or digit strings.
   */
  public static toStrictInteger(value: unknown, modifier: string): number {
    if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
      return value;
    }
    if (typeof value === 'bigint' && value >= BigInt(0) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
      return Number(value);
    }
    if (typeof value === 'string' && SliceValidator.DIGITS.test(value)) {
      const parsed = Number(value);
      if (Number.isSafeInteger(parsed)) {
        return parsed;
      }
    }
    throw new ValidationError(`${modifier} must be a non-negative integer`, { modifier, value });
  }
}
