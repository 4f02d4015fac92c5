import { errorMessage } from '../errors.js';
import { type Validator, ValidationResult } from './validation-result.js';

export class JsonValidator implements Validator {
  async validate(content: string): Promise<ValidationResult> {
    return this.validateSync(content);
  }

  validateSync(content: string): ValidationResult {
    try {
      JSON.parse(content);
    } catch (error) {
      return ValidationResult.failure([`JSON syntax error: ${errorMessage(error)}`]);
    }
    return ValidationResult.success();
  }
}
