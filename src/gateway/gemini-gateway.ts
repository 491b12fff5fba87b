/**
 * Classification Gateway - Google Gemini with Structured Output
 *
 * Embeds feedback text and classifies it into sentiment / topics / urgency /
 * intent, answers questions over retrieved feedback, and evaluates ad-hoc
 * criteria.
 *
 * Features:
 * - text-embedding-004 for embed and batch embed (one request per batch)
 * - JSON schema-constrained output for classification and criteria calls
 * - Zod validation as belt-and-suspenders after Gemini's schema enforcement
 * - classify / matchCriteria never reject; failures are logged and replaced
 *   by fixed fallbacks
 * - No feedback text in logs
 *
 * Consumers: index.ts, cli.ts (wired into ingestion and query services)
 */

import { GoogleGenerativeAI, SchemaType, type ResponseSchema } from '@google/generative-ai';
import { z } from 'zod';
import { gatewayConfig, type GatewayConfig } from './config.js';
import { buildAnswerPrompt, buildClassificationPrompt, buildCriteriaPrompt } from './prompts.js';
import { GatewayError } from './types.js';
import {
  FAILED_CLASSIFICATION_SUMMARY,
  IntentSchema,
  SentimentSchema,
  TOPICS,
  UrgencySchema,
  failedClassification,
} from '../feedback/types.js';
import type { Classification, FeedbackItem } from '../feedback/types.js';
import type {
  ClassificationGateway,
  ClassificationOutcome,
  ClassifyContext,
  CriteriaMatch,
} from './types.js';

// ---------------------------------------------------------------------------
// Gemini Response Schemas
// ---------------------------------------------------------------------------

const classificationResponseSchema: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    sentiment: {
      type: SchemaType.STRING,
      description: 'positive, neutral or negative',
    },
    topics: {
      type: SchemaType.ARRAY,
      description: '1-3 topics from the taxonomy',
      items: { type: SchemaType.STRING },
    },
    urgency: {
      type: SchemaType.STRING,
      description: 'low, medium or high',
    },
    intent: {
      type: SchemaType.STRING,
      description: 'churn_risk, upsell_opportunity, support_needed, feature_advocacy or general_feedback',
    },
    summary: {
      type: SchemaType.STRING,
      description: 'One sentence summary, max 100 characters',
    },
    confidence: {
      type: SchemaType.NUMBER,
      description: 'Confidence score between 0.0 and 1.0',
    },
  },
  required: ['sentiment', 'topics', 'urgency', 'intent', 'summary', 'confidence'],
};

const criteriaResponseSchema: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    matches: {
      type: SchemaType.BOOLEAN,
      description: 'Whether the feedback satisfies the question',
    },
    reason: {
      type: SchemaType.STRING,
      description: 'Brief explanation',
    },
  },
  required: ['matches', 'reason'],
};

// ---------------------------------------------------------------------------
// Response validation
// ---------------------------------------------------------------------------

const KNOWN_TOPICS: ReadonlySet<string> = new Set(TOPICS);

const ClassificationResponseSchema = z.object({
  sentiment: SentimentSchema,
  topics: z.array(z.string()),
  urgency: UrgencySchema,
  intent: IntentSchema,
  summary: z.string(),
  confidence: z.number().optional(),
});

const CriteriaResponseSchema = z.object({
  matches: z.boolean(),
  reason: z.string(),
});

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parse a raw classification response into a tagged outcome.
 * Topics outside the taxonomy are dropped; confidence defaults to 0.8 and is
 * clamped to [0, 1].
 */
export function parseClassification(responseText: string): ClassificationOutcome {
  let raw: unknown;
  try {
    raw = JSON.parse(responseText);
  } catch (err) {
    return { ok: false, reason: `response is not JSON: ${errorMessage(err)}` };
  }

  const parsed = ClassificationResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: `invalid ${issue.path.join('.') || 'response'}: ${issue.message}` };
  }

  const topics = [...new Set(parsed.data.topics.map(t => t.trim().toLowerCase()))]
    .filter(t => KNOWN_TOPICS.has(t));
  const confidence = Math.min(1, Math.max(0, parsed.data.confidence ?? 0.8));

  return {
    ok: true,
    classification: {
      sentiment: parsed.data.sentiment,
      topics,
      urgency: parsed.data.urgency,
      intent: parsed.data.intent,
      summary: parsed.data.summary.trim(),
      confidence,
    },
  };
}

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

export class GeminiGateway implements ClassificationGateway {
  private genAI: GoogleGenerativeAI | null = null;

  constructor(private readonly config: GatewayConfig = gatewayConfig) {}

  async embed(text: string): Promise<number[]> {
    const model = this.client().getGenerativeModel({ model: this.config.embeddingModel });
    const result = await model.embedContent(text);
    return result.embedding.values;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const model = this.client().getGenerativeModel({ model: this.config.embeddingModel });
    const result = await model.batchEmbedContents({
      requests: texts.map(text => ({
        content: { role: 'user', parts: [{ text }] },
      })),
    });

    if (result.embeddings.length !== texts.length) {
      throw new GatewayError(
        `Batch embedding returned ${result.embeddings.length} vectors for ${texts.length} texts`,
      );
    }
    return result.embeddings.map(e => e.values);
  }

  async classify(text: string, context: ClassifyContext = {}): Promise<Classification> {
    const outcome = await this.attemptClassification(text, context);
    if (outcome.ok) return outcome.classification;

    console.error('[gateway] Classification failed, storing placeholder', {
      source: context.source ?? 'unknown',
      reason: outcome.reason,
    });
    return failedClassification();
  }

  /** One classification call with every failure folded into the outcome */
  async attemptClassification(text: string, context: ClassifyContext = {}): Promise<ClassificationOutcome> {
    try {
      const model = this.client().getGenerativeModel({
        model: this.config.classificationModel,
        generationConfig: {
          temperature: this.config.classificationTemperature,
          responseMimeType: 'application/json',
          responseSchema: classificationResponseSchema,
        },
      });
      const result = await model.generateContent(buildClassificationPrompt(text, context));
      return parseClassification(result.response.text());
    } catch (err) {
      return { ok: false, reason: errorMessage(err) };
    }
  }

  async answer(question: string, items: FeedbackItem[], extraContext = ''): Promise<string> {
    const model = this.client().getGenerativeModel({
      model: this.config.classificationModel,
      generationConfig: {
        temperature: this.config.answerTemperature,
        maxOutputTokens: this.config.answerMaxTokens,
      },
    });
    const result = await model.generateContent(buildAnswerPrompt(question, items, extraContext));
    return result.response.text();
  }

  async matchCriteria(itemText: string, criteria: string): Promise<CriteriaMatch> {
    try {
      const model = this.client().getGenerativeModel({
        model: this.config.classificationModel,
        generationConfig: {
          temperature: this.config.classificationTemperature,
          responseMimeType: 'application/json',
          responseSchema: criteriaResponseSchema,
        },
      });
      const result = await model.generateContent(buildCriteriaPrompt(itemText, criteria));
      return CriteriaResponseSchema.parse(JSON.parse(result.response.text()));
    } catch (err) {
      console.error('[gateway] Criteria match failed', { error: errorMessage(err) });
      return { matches: false, reason: FAILED_CLASSIFICATION_SUMMARY };
    }
  }

  // Lazy client so a missing key only fails the first real request
  private client(): GoogleGenerativeAI {
    if (this.genAI) return this.genAI;
    if (!this.config.geminiApiKey) {
      throw new GatewayError(
        'Missing required environment variable: GOOGLE_API_KEY. ' +
        'Copy .env.example to .env and fill in the required values.',
      );
    }
    this.genAI = new GoogleGenerativeAI(this.config.geminiApiKey);
    return this.genAI;
  }
}
