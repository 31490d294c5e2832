import type { SectionDefinition, SectionValueType } from '../model/SectionDefinition.js';
import type { FrameValidationResult } from '../model/ValidationResult.js';
import { validResult, invalidResult } from '../model/ValidationResult.js';
import { FRAME_SECTIONS, FIELD_DELIMITER } from '../model/FrameLayout.js';

const BYTE_ORDER_MARK = /\uFEFF/g;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_DECIMAL_PATTERN = /^([+-]?)(nan|inf|infinity)$/i;

/** Split frame text into trimmed, non-empty tokens. */
export function tokenizeFrame(text: string, delimiter: string = FIELD_DELIMITER): string[] {
  return text
    .replace(BYTE_ORDER_MARK, '')
    .split(delimiter)
    .map((token) => token.trim())
    .filter((token) => token !== '');
}

/** Parse a decimal token, accepting the `nan`/`inf` spellings devices print. Returns `undefined` when malformed. */
export function parseDecimal(token: string): number | undefined {
  if (DECIMAL_PATTERN.test(token)) return Number(token);

  const special = SPECIAL_DECIMAL_PATTERN.exec(token);
  if (!special) return undefined;
  const [, sign, word] = special;
  if (word?.toLowerCase() === 'nan') return NaN;
  return sign === '-' ? -Infinity : Infinity;
}

/**
 * Parse an integer token. Decimals with an integral value (`3.0`) are accepted.
 * Values outside the safe-integer range are rejected rather than rounded.
 */
export function parseInteger(token: string): number | undefined {
  if (!INTEGER_PATTERN.test(token) && !DECIMAL_PATTERN.test(token)) return undefined;

  const value = Number(token);
  return Number.isSafeInteger(value) ? value : undefined;
}

function parseValue(token: string, type: SectionValueType): number | undefined {
  return type === 'integer' ? parseInteger(token) : parseDecimal(token);
}

/**
 * Domain service that validates one raw frame against the section table.
 *
 * A single data-driven pass: each section starts at its label and owns every
 * token up to the next section's label. The first section whose label,
 * cardinality or numeric content is wrong fails the whole frame.
 */
export class FrameValidator {
  constructor(private readonly sections: readonly SectionDefinition[] = FRAME_SECTIONS) {
    if (sections.length === 0) {
      throw new Error('Frame layout must declare at least one section');
    }
  }

  validate(text: string): FrameValidationResult {
    return this.validateTokens(tokenizeFrame(text));
  }

  validateTokens(tokens: readonly string[]): FrameValidationResult {
    const parsed = new Map<string, readonly number[]>();
    let position = 0;

    for (let i = 0; i < this.sections.length; i++) {
      const section = this.sections[i];
      if (!section) break;
      const next = this.sections[i + 1];

      const token = tokens[position];
      if (token === undefined) {
        return invalidResult({
          section: section.name,
          code: 'MISSING_SECTION',
          message: `Section '${section.name}' is missing: frame ended before label '${section.label}'`,
          expected: section.count,
        });
      }
      if (token !== section.label) {
        return invalidResult({
          section: section.name,
          code: 'UNEXPECTED_LABEL',
          message: `Expected label '${section.label}' at token ${String(position)}, found '${token}'`,
          expected: section.count,
          value: token,
        });
      }

      const end = next ? tokens.indexOf(next.label, position + 1) : tokens.length;
      if (next && end === -1) {
        return invalidResult({
          section: next.name,
          code: 'MISSING_SECTION',
          message: `Section '${next.name}' is missing: label '${next.label}' not found after section '${section.name}'`,
          expected: next.count,
        });
      }

      const valueTokens = tokens.slice(position + 1, end);
      if (valueTokens.length !== section.count) {
        return invalidResult({
          section: section.name,
          code: 'SECTION_CARDINALITY',
          message: `Section '${section.name}' expected ${String(section.count)} values, found ${String(valueTokens.length)}`,
          expected: section.count,
          observed: valueTokens.length,
        });
      }

      const values: number[] = [];
      for (let k = 0; k < valueTokens.length; k++) {
        const raw = valueTokens[k] ?? '';
        const value = parseValue(raw, section.valueType);
        if (value === undefined) {
          return invalidResult({
            section: section.name,
            code: 'MALFORMED_NUMBER',
            message: `${section.name}[${String(k + 1)}] is not ${section.valueType === 'integer' ? 'an integer' : 'a number'}: '${raw}'`,
            expected: section.count,
            value: raw,
          });
        }
        values.push(value);
      }

      parsed.set(section.name, values);
      position = end;
    }

    return validResult(parsed);
  }
}
