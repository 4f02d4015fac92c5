export { type PromptListing, PromptCatalog, type PromptTemplates, type PromptVariables } from './prompt-catalog.js';
