import { HtmlValidate } from 'html-validate';
import { errorMessage } from '../errors.js';
import { type Validator, ValidationResult } from './validation-result.js';

const UNBALANCED = 'HTML fragment has unclosed or stray tags';

const FULL_DOCUMENT = /^\s*<(?:!DOCTYPE|html)(\s|>)/i;

/**
 * Structural HTML check for documents and fragments.
 *
 * Fragments are wrapped in a `<div>` first; reports about the wrapper itself are
 * dropped and positions refer to the fragment. Only structural rules are enabled
 * (mismatched or stray end tags, malformed attributes, parser errors); element
 * names the HTML5 metadata does not know are accepted.
 */
export class HtmlValidator implements Validator {
  private readonly engine = new HtmlValidate({
    root: true,
    elements: ['html5'],
    rules: {
      'close-order': 'error',
      'close-attr': 'error',
    },
  });

  async validate(content: string): Promise<ValidationResult> {
    if (FULL_DOCUMENT.test(content)) {
      return this.check(content, 0, Number.POSITIVE_INFINITY);
    }
    // Wrapper tags sit on their own lines so content columns are unchanged
    const lastLine = content.split('\n').length;
    return this.check(`<div>\n${content}\n</div>`, 1, lastLine);
  }

  private async check(markup: string, lineOffset: number, lastLine: number): Promise<ValidationResult> {
    try {
      const report = await this.engine.validateString(markup);
      if (report.valid) {
        return ValidationResult.success();
      }
      const messages = report.results.flatMap((result) =>
        result.messages
          .map((message) => ({ ...message, line: message.line - lineOffset }))
          .filter((message) => message.line >= 1 && message.line <= lastLine)
          .map((message) => `Line ${message.line}, column ${message.column}: ${message.message}`),
      );
      return ValidationResult.failure(messages.length > 0 ? messages : [UNBALANCED]);
    } catch (error) {
      return ValidationResult.failure([`HTML parse error: ${errorMessage(error)}`]);
    }
  }
}
