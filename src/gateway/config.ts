/**
 * Classification Gateway Configuration
 *
 * Centralizes environment variable access for the Gemini-backed gateway.
 * Follows the same pattern as src/config.ts.
 *
 * Environment variables:
 * - GOOGLE_API_KEY: Gemini API key (checked when the first request is made)
 * - EMBEDDING_MODEL: Embedding model ID (default: text-embedding-004, 768 dims)
 * - CLASSIFICATION_MODEL: Generative model ID (default: gemini-2.0-flash)
 */

import 'dotenv/config';

export interface GatewayConfig {
  /** Gemini API key; empty until configured */
  geminiApiKey: string;
  /** Model used for embed/embedBatch */
  embeddingModel: string;
  /** Model used for classify/answer/matchCriteria */
  classificationModel: string;
  /** Sampling temperature for structured classification calls */
  classificationTemperature: number;
  /** Sampling temperature for free-text answers */
  answerTemperature: number;
  /** Output cap for free-text answers */
  answerMaxTokens: number;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

export const gatewayConfig: GatewayConfig = {
  geminiApiKey: optionalEnv('GOOGLE_API_KEY'),
  embeddingModel: optionalEnv('EMBEDDING_MODEL', 'text-embedding-004'),
  classificationModel: optionalEnv('CLASSIFICATION_MODEL', 'gemini-2.0-flash'),
  classificationTemperature: 0.1,
  answerTemperature: 0.3,
  answerMaxTokens: 1000,
};
