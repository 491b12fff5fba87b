/**
 * Classification Gateway - Barrel Export
 */

export type {
  ClassificationGateway,
  ClassificationOutcome,
  ClassifyContext,
  CriteriaMatch,
} from './types.js';
export { GatewayError } from './types.js';
export { gatewayConfig } from './config.js';
export { GeminiGateway, parseClassification } from './gemini-gateway.js';
export { buildAnswerPrompt, buildClassificationPrompt, buildCriteriaPrompt, npsLabel } from './prompts.js';
