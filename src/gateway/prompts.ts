/**
 * Gateway Prompts
 *
 * Pure prompt builders for the three generative calls: classification,
 * question answering over retrieved feedback, and ad-hoc criteria matching.
 */

import { INTENTS, SENTIMENTS, TOPICS, URGENCY_LEVELS } from '../feedback/types.js';
import type { FeedbackItem } from '../feedback/types.js';
import type { ClassifyContext } from './types.js';

/** Items beyond this are left out of the answer prompt */
export const ANSWER_CONTEXT_ITEMS = 20;
/** Per-item text cap in the answer prompt */
export const ANSWER_TEXT_CHARS = 500;

export function npsLabel(score: number): 'Promoter' | 'Passive' | 'Detractor' {
  if (score >= 9) return 'Promoter';
  if (score >= 7) return 'Passive';
  return 'Detractor';
}

const quoted = (values: readonly string[]) => values.map(v => `"${v}"`).join(', ');

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export function buildClassificationPrompt(text: string, context: ClassifyContext = {}): string {
  const lines: string[] = [`Feedback Source: ${context.source ?? 'unknown'}`];

  if (context.npsScore !== null && context.npsScore !== undefined) {
    lines.push(`NPS Score: ${context.npsScore}/10 (${npsLabel(context.npsScore)})`);
  }

  const profile = context.userProfile;
  if (profile) {
    lines.push(
      'User Context:',
      `- Subscription: ${profile.subscriptionType ?? 'unknown'}`,
      `- MRR: $${(profile.mrr ?? 0).toFixed(2)}`,
      `- Company: ${profile.companyName ?? 'unknown'}`,
      `- Industry: ${profile.industry ?? 'unknown'}`,
    );
  }

  return `Analyze this customer feedback and classify it.

${lines.join('\n')}

Feedback Text:
"""${text}"""

Classify into the following categories:

1. sentiment: One of [${quoted(SENTIMENTS)}]

2. topics: Array of applicable topics from [${quoted(TOPICS)}]. Select 1-3 most relevant topics.

3. urgency: One of [${quoted(URGENCY_LEVELS)}]
   - high: Critical issues, potential churn, security/data concerns
   - medium: Significant friction, clear frustration
   - low: General feedback, suggestions, minor issues

4. intent: One of [${quoted(INTENTS)}]
   - churn_risk: User expressing frustration that could lead to cancellation
   - upsell_opportunity: User requesting features in higher tiers or expressing growth needs
   - support_needed: User needs help with current functionality
   - feature_advocacy: User loves a feature or wants to see it expanded
   - general_feedback: General comments without specific action needed

5. summary: One sentence summary of the feedback (max 100 chars)

6. confidence: Your confidence in this classification (0.0 to 1.0)`;
}

// ---------------------------------------------------------------------------
// Question answering
// ---------------------------------------------------------------------------

function describeItem(item: FeedbackItem, position: number): string {
  let header = `${position}. [${item.source}]`;

  if (item.userProfile) {
    header += ` [${item.userProfile.subscriptionType ?? 'unknown'}, $${Math.round(item.userProfile.mrr ?? 0)} MRR]`;
  }
  if (item.npsScore !== null) {
    header += ` NPS: ${item.npsScore}`;
  }
  if (item.classification) {
    header += ` (sentiment: ${item.classification.sentiment}, topics: ${item.classification.topics.join(', ')})`;
  }

  return `${header}\n   "${item.text.slice(0, ANSWER_TEXT_CHARS)}"`;
}

export function buildAnswerPrompt(question: string, items: FeedbackItem[], extraContext = ''): string {
  const feedback = items
    .slice(0, ANSWER_CONTEXT_ITEMS)
    .map((item, i) => describeItem(item, i + 1))
    .join('\n\n');

  const contextSection = extraContext ? `\n${extraContext}\n` : '';

  return `You are a helpful assistant for Product Managers analyzing customer feedback.
${contextSection}
Here are relevant feedback items:

${feedback}

Based on this feedback, answer the following question:
${question}

Provide a clear, actionable answer. Include specific examples from the feedback when relevant.
If the feedback doesn't contain enough information to fully answer, say so.`;
}

// ---------------------------------------------------------------------------
// Custom criteria
// ---------------------------------------------------------------------------

export function buildCriteriaPrompt(itemText: string, criteria: string): string {
  return `Analyze this customer feedback based on the following question:

Question: ${criteria}

Feedback:
"""${itemText}"""

Set matches to true only if the feedback satisfies the question, and give a brief reason.`;
}
