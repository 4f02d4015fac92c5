export { HtmlValidator } from './html-validator.js';
export { JsonValidator } from './json-validator.js';
export {
  applyRepairs,
  capture,
  type JsonValue,
  REPAIR_MISSING_NULLS,
  type RepairFeature,
  Schema,
  type SchemaNode,
  validate as validateSchema,
} from './schema.js';
export { TextLengthValidator } from './text-length-validator.js';
export { ValidationResult, type Validator } from './validation-result.js';
