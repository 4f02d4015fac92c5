/**
 * Outcome of a syntax, schema or length check.
 */
export class ValidationResult {
  private constructor(
    readonly valid: boolean,
    readonly errors: readonly string[],
  ) {}

  static success(): ValidationResult {
    return new ValidationResult(true, []);
  }

  static failure(errors: readonly string[]): ValidationResult {
    return new ValidationResult(false, [...errors]);
  }

  isValid(): boolean {
    return this.valid;
  }

  getErrors(): string[] {
    return [...this.errors];
  }
}

export interface Validator {
  validate(content: string): Promise<ValidationResult>;
}
