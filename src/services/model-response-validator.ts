/**
 * Model Response Validator
 * Validates raw sentiment model outputs against the model response schema.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { ModelResponseSchema, ModelResponseOutput } from '../schemas/model-response';
import { ModelScore } from '../types/sentiment';

/**
 * Maximum stored rationale length, including the ellipsis
 */
export const MAX_RATIONALE_LENGTH = 275;

export interface SchemaValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

export interface ModelResponseValidationResult {
  valid: boolean;
  errors: SchemaValidationError[];
  rawOutput: string;
  score?: ModelScore;
}

export function truncateRationale(rationale: string): string {
  if (rationale.length <= MAX_RATIONALE_LENGTH) {
    return rationale;
  }
  return `${rationale.slice(0, MAX_RATIONALE_LENGTH - 3)}...`;
}

export class ModelResponseValidator {
  private ajv: Ajv;
  private validateResponse: ValidateFunction<ModelResponseOutput>;

  constructor() {
    this.ajv = new Ajv({ allErrors: true, verbose: true, useDefaults: true });
    this.validateResponse = this.ajv.compile<ModelResponseOutput>(ModelResponseSchema);
  }

  /**
   * Converts AJV errors to our SchemaValidationError format
   */
  private convertErrors(errors: ErrorObject[] | null | undefined): SchemaValidationError[] {
    if (!errors) return [];

    return errors.map((error) => ({
      path: error.instancePath || '/',
      message: error.message || 'Unknown validation error',
      keyword: error.keyword,
      params: { ...error.params }
    }));
  }

  /**
   * Parses raw model text to JSON. Models often wrap JSON in prose or code fences,
   * so the outermost object literal is extracted first.
   */
  private parseOutput(rawOutput: string): { parsed: unknown; error?: string } {
    const start = rawOutput.indexOf('{');
    const end = rawOutput.lastIndexOf('}');
    const candidate = start >= 0 && end > start ? rawOutput.slice(start, end + 1) : rawOutput;

    try {
      return { parsed: JSON.parse(candidate) };
    } catch (e) {
      return {
        parsed: null,
        error: `JSON parse error: ${e instanceof Error ? e.message : 'Unknown error'}`
      };
    }
  }

  /**
   * Validate a raw model output (JSON text or object) and turn it into a ModelScore
   */
  validate(output: unknown): ModelResponseValidationResult {
    const rawOutput = typeof output === 'string' ? output : JSON.stringify(output) ?? String(output);

    let parsedOutput: unknown;
    if (typeof output === 'string') {
      const parseResult = this.parseOutput(output);
      if (parseResult.error) {
        return {
          valid: false,
          errors: [{
            path: '/',
            message: parseResult.error,
            keyword: 'parse',
            params: {}
          }],
          rawOutput
        };
      }
      parsedOutput = parseResult.parsed;
    } else if (typeof output === 'object' && output !== null) {
      parsedOutput = { ...output };
    } else {
      parsedOutput = output;
    }

    if (this.validateResponse(parsedOutput)) {
      return {
        valid: true,
        errors: [],
        rawOutput,
        score: {
          sentiment: parsedOutput.sentiment,
          confidence: parsedOutput.confidence,
          horizon: parsedOutput.horizon,
          rationale: truncateRationale(parsedOutput.rationale)
        }
      };
    }

    return {
      valid: false,
      errors: this.convertErrors(this.validateResponse.errors),
      rawOutput
    };
  }
}
