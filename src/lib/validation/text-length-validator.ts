import type { ModelConfig } from '../translation/types.js';
import { type Validator, ValidationResult } from './validation-result.js';

const CHARS_PER_TOKEN = 4;

/**
 * Caps the prepared text length. The effective limit is the model limit minus
 * an overhead reserved for prompts and markers; an effective limit of 0 means
 * no cap. Length is counted in code points.
 */
export class TextLengthValidator implements Validator {
  private readonly limitChars: number;
  private readonly overheadChars: number;

  constructor(limitChars: number, overheadChars = 2000) {
    this.limitChars = Math.max(0, limitChars - Math.max(0, overheadChars));
    this.overheadChars = overheadChars;
  }

  get effectiveLimit(): number {
    return this.limitChars;
  }

  async validate(content: string): Promise<ValidationResult> {
    return this.validateSync(content);
  }

  validateSync(content: string): ValidationResult {
    const length = [...content].length;
    if (this.limitChars > 0 && length > this.limitChars) {
      const excess = length - this.limitChars;
      return ValidationResult.failure([
        `Prepared text length ${length} exceeds limit ${this.limitChars} by ${excess} chars ` +
          `(includes ${this.overheadChars} overhead). Split input or reduce max output tokens.`,
      ]);
    }
    return ValidationResult.success();
  }

  /**
   * Derive the cap from `limits`: a token budget (max_tokens minus the output
   * reservation, at ~4 chars per token) when known, bounded by
   * estimated_max_chars.
   */
  static fromModelConfig(
    model: Pick<ModelConfig, 'limits'>,
    fallbackReservePct = 20,
    overheadChars = 2000,
  ): TextLengthValidator {
    const limits = model.limits ?? {};
    const estimatedMaxChars = limits.estimated_max_chars ?? 0;
    const maxTokens = limits.max_tokens ?? 0;
    const maxOutputTokens = limits.max_output_tokens ?? 0;

    let limitChars = estimatedMaxChars;
    if (maxTokens > 0) {
      const reservedOut =
        maxOutputTokens > 0 ? maxOutputTokens : Math.max(1, Math.floor(maxTokens * (fallbackReservePct / 100)));
      const charsByTokens = Math.max(0, maxTokens - reservedOut) * CHARS_PER_TOKEN;
      limitChars = estimatedMaxChars > 0 ? Math.min(estimatedMaxChars, charsByTokens) : charsByTokens;
    }

    return new TextLengthValidator(limitChars, overheadChars);
  }
}
