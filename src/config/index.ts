export type { ConfigFormat } from './loader.js';
export { loadConfigFromFile, loadConfigFromObject, loadConfigFromText } from './loader.js';
export type { EvalConfig, EvalConfigInput } from './schema.js';
export { defaultEvalConfig, evalConfigSchema, splitConfigSchema } from './schema.js';
