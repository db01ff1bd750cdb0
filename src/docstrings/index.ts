/**
 * Docstring engine exports
 */

export * from './types.js';
export { parse, serialize } from './parsers/python.js';
export { walkDefinitions, findUndocumented, isDocumented, countDefinitions } from './locator.js';
export { extractSource } from './snippet.js';
export { insertDocstring } from './mutator.js';
export { renderDocstring, escapeDocstring, cleandoc } from './render.js';
export { finalize, type FinalizeResult } from './validator.js';
export { DocstringPipeline, summarizeOutcomes, type PipelineOptions } from './pipeline.js';
export {
  DocstringGenerator,
  type GeneratorOptions,
  type GenerationContext,
} from './llm/client.js';
export {
  OpenAIOracle,
  OracleError,
  type DocstringOracle,
  type OracleCallOptions,
  type OpenAIOracleOptions,
  type TransportFailure,
} from './llm/oracle.js';
export { buildPrompt, GOOGLE_STYLE_CONTRACT, SYSTEM_PROMPT } from './llm/prompt.js';
export type { GenerationRequest, PromptMessage } from './llm/prompt.js';
export { normalizeGeneration } from './llm/normalize.js';
export { discoverSourceFiles, toIgnoreGlobs, type DiscoveryOptions } from './scanners/filesystem.js';
export {
  extractDocInfo,
  renderMarkdown,
  generateReferenceDocs,
  docstringText,
  parseReturns,
  parseRaises,
  type DocEntry,
  type ModuleDoc,
} from './generators/reference.js';
