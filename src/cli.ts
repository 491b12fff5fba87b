#!/usr/bin/env node
/**
 * Command-Line Interface
 *
 * Usage:
 *   npx tsx src/cli.ts ingest "Checkout keeps timing out" --source=nps --nps-score=3 --user-id=u-1 --mrr=250
 *   npx tsx src/cli.ts import --format=nps_csv --file=./exports/nps.csv [--skip-classification]
 *   npx tsx src/cli.ts search --query="pricing complaints" --sentiments=negative --days=30
 *   npx tsx src/cli.ts ask "What are enterprise customers unhappy about?" --subscriptions=enterprise
 *   npx tsx src/cli.ts alerts churn --min-mrr=500
 *   npx tsx src/cli.ts stats --days=7
 *   npx tsx src/cli.ts topic billing --days=30
 *   npx tsx src/cli.ts reclassify --batch-size=100
 *   npx tsx src/cli.ts serve
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { flagValue, hasFlag, parseArgs, type ParsedArgs } from './cli-args.js';
import { FeedbackValidationError } from './feedback/errors.js';
import { FeedbackSourceSchema, type FeedbackItem, type FeedbackSource, type SearchResult } from './feedback/types.js';
import { IMPORT_FORMATS, startImportJob, type ImportFormat, type ImportResult } from './jobs/index.js';
import { createServices, type Services } from './services.js';
import type { SearchParams } from './query/index.js';

const USAGE = `Usage: feedback-radar <command> [args]

Commands:
  ingest <text>        Ingest one feedback item (--source, --nps-score, --user-id, --subscription, --mrr)
  import               Bulk import a file (--format=${IMPORT_FORMATS.join('|')}, --file, --skip-classification)
  search               Search feedback (--query, --sources, --sentiments, --topics, --urgency, --intents,
                       --subscriptions, --industries, --min-mrr, --max-mrr, --min-nps, --max-nps, --days, --limit)
  ask <question>       Ask a question about feedback (same filters as search)
  alerts <type>        churn | urgent | upsell | detractors | promoters (--min-mrr, --days)
  stats                Aggregate statistics (--days)
  topic <topic>        AI summary of one topic (--days)
  reclassify           Reclassify the newest items (--batch-size)
  serve                Start the HTTP API`;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function numberFlag(args: ParsedArgs, name: string): number | undefined {
  const raw = flagValue(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new FeedbackValidationError(`--${name} must be a number, got "${raw}"`, name);
  }
  return value;
}

function searchParamsFromFlags(args: ParsedArgs): SearchParams {
  return {
    query: flagValue(args, 'query'),
    sources: flagValue(args, 'sources'),
    sentiments: flagValue(args, 'sentiments'),
    topics: flagValue(args, 'topics'),
    urgencyLevels: flagValue(args, 'urgency'),
    intents: flagValue(args, 'intents'),
    subscriptionTypes: flagValue(args, 'subscriptions'),
    industries: flagValue(args, 'industries'),
    minMrr: flagValue(args, 'min-mrr'),
    maxMrr: flagValue(args, 'max-mrr'),
    minNps: flagValue(args, 'min-nps'),
    maxNps: flagValue(args, 'max-nps'),
    daysBack: flagValue(args, 'days') ?? '30',
    limit: flagValue(args, 'limit'),
  };
}

function printItem(item: FeedbackItem, index: number, width: number): void {
  const text = item.text.length > width ? `${item.text.slice(0, width)}...` : item.text;
  console.log(`${index}. [${item.source}] ${text}`);

  const c = item.classification;
  if (c) {
    console.log(`   Sentiment: ${c.sentiment} | Topics: ${c.topics.join(', ') || '-'} | Urgency: ${c.urgency} | Intent: ${c.intent}`);
  }
  const u = item.userProfile;
  if (u) {
    console.log(`   User: ${u.subscriptionType ?? 'unknown'} | MRR: $${(u.mrr ?? 0).toFixed(0)}`);
  }
  if (item.npsScore !== null) {
    console.log(`   NPS: ${item.npsScore}`);
  }
  console.log('');
}

function printResult(title: string, result: SearchResult, width = 100): void {
  console.log(`\n${title} (${result.totalCount} found, showing ${result.items.length}):\n`);
  result.items.forEach((item, i) => printItem(item, i + 1, width));
}

function printCounts(title: string, counts: { readonly [key: string]: number | undefined }, top?: number): void {
  console.log(`\n${title}:`);
  const entries = Object.entries(counts)
    .map(([key, count]): [string, number] => [key, count ?? 0])
    .sort((a, b) => b[1] - a[1]);
  for (const [key, count] of top ? entries.slice(0, top) : entries) {
    console.log(`  ${key}: ${count}`);
  }
}

function importFormatFor(args: ParsedArgs, file: string): ImportFormat {
  const explicit = flagValue(args, 'format');
  const format = explicit ?? (extname(file) === '.json' ? 'zendesk_json' : 'nps_csv');
  const match = IMPORT_FORMATS.find(f => f === format);
  if (!match) {
    throw new FeedbackValidationError(`Unknown import format "${format}". Use one of: ${IMPORT_FORMATS.join(', ')}`, 'format');
  }
  return match;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function cmdIngest(services: Services, args: ParsedArgs): Promise<void> {
  if (flagValue(args, 'file')) {
    await cmdImport(services, args);
    return;
  }

  const text = args.positionals[0];
  if (!text) {
    throw new FeedbackValidationError('ingest needs the feedback text as its first argument', 'text');
  }

  const source = FeedbackSourceSchema.safeParse(flagValue(args, 'source') ?? 'nps');
  if (!source.success) {
    throw new FeedbackValidationError(`Unknown source "${flagValue(args, 'source')}"`, 'source');
  }

  const userId = flagValue(args, 'user-id');
  const item = await services.ingester.ingestSingle({
    text,
    source: source.data,
    npsScore: numberFlag(args, 'nps-score') ?? null,
    userProfile: userId
      ? {
        userId,
        email: flagValue(args, 'email') ?? null,
        subscriptionType: flagValue(args, 'subscription') ?? null,
        mrr: numberFlag(args, 'mrr') ?? null,
        companyName: null,
        industry: null,
        signupDate: null,
        customTraits: {},
      }
      : null,
    skipClassification: hasFlag(args, 'skip-classification'),
  });

  console.log(`\nFeedback ID: ${item.id}`);
  console.log(`Source: ${item.source}`);
  const c = item.classification;
  if (c) {
    console.log('\nClassification:');
    console.log(`  Sentiment: ${c.sentiment}`);
    console.log(`  Topics: ${c.topics.join(', ')}`);
    console.log(`  Urgency: ${c.urgency}`);
    console.log(`  Intent: ${c.intent}`);
    console.log(`  Summary: ${c.summary}`);
    console.log(`  Confidence: ${c.confidence.toFixed(2)}`);
  }
}

async function cmdImport(services: Services, args: ParsedArgs): Promise<void> {
  const file = flagValue(args, 'file');
  if (!file) {
    throw new FeedbackValidationError('import needs --file=<path>', 'file');
  }
  const format = importFormatFor(args, file);
  const content = extname(file) === '.xlsx' ? readFileSync(file) : readFileSync(file, 'utf-8');

  let source: FeedbackSource | undefined;
  const sourceFlag = flagValue(args, 'source');
  if (sourceFlag !== undefined) {
    const parsed = FeedbackSourceSchema.safeParse(sourceFlag);
    if (!parsed.success) {
      throw new FeedbackValidationError(`Unknown source "${sourceFlag}"`, 'source');
    }
    source = parsed.data;
  }

  const job = startImportJob(services, {
    format,
    content,
    source,
    skipClassification: hasFlag(args, 'skip-classification'),
  });
  console.log(`Import job ${job.id} started (${format})`);

  const finished = await services.tracker.waitForJob(job.id);
  if (!finished || finished.status !== 'completed') {
    throw new Error(`Import ${finished?.status ?? 'vanished'}: ${finished?.error ?? 'unknown error'}`);
  }

  const result = importResult(finished.result);
  console.log(`Imported ${result.imported} (skipped ${result.skipped}, errors ${result.errors})`);
  for (const message of result.errorMessages) {
    console.log(`  ${message}`);
  }
}

function importResult(value: unknown): ImportResult {
  if (typeof value === 'object' && value !== null && 'imported' in value && 'skipped' in value
    && 'errors' in value && 'errorMessages' in value
    && typeof value.imported === 'number' && typeof value.skipped === 'number'
    && typeof value.errors === 'number' && Array.isArray(value.errorMessages)) {
    return {
      imported: value.imported,
      skipped: value.skipped,
      errors: value.errors,
      errorMessages: value.errorMessages.map(String),
    };
  }
  throw new Error('Import job finished without a result');
}

async function cmdSearch(services: Services, args: ParsedArgs): Promise<void> {
  const result = await services.queryService.search(searchParamsFromFlags(args));
  printResult('Results', result);
}

async function cmdAsk(services: Services, args: ParsedArgs): Promise<void> {
  const question = args.positionals[0];
  if (!question) {
    throw new FeedbackValidationError('ask needs a question as its first argument', 'question');
  }
  const { query: _query, limit: _limit, ...filters } = searchParamsFromFlags(args);
  const { answer, feedbackCount } = await services.queryService.ask(question, filters);
  console.log(`\nQuestion: ${question}\n`);
  console.log(`Answer (from ${feedbackCount} matching items):\n${answer}\n`);
}

async function cmdAlerts(services: Services, args: ParsedArgs): Promise<void> {
  const type = args.positionals[0];
  const daysBack = numberFlag(args, 'days');
  const { queryService } = services;

  switch (type) {
    case 'churn':
      printResult('Churn Risk Alerts', await queryService.getChurnRisks({ minMrr: numberFlag(args, 'min-mrr'), daysBack }), 150);
      return;
    case 'urgent':
      printResult('Urgent Issues', await queryService.getUrgentIssues({ daysBack }), 150);
      return;
    case 'upsell':
      printResult('Upsell Opportunities', await queryService.getUpsellOpportunities({ daysBack }), 150);
      return;
    case 'detractors':
      printResult('Detractor Feedback (NPS 0-6)', await queryService.getDetractorFeedback({ daysBack }), 150);
      return;
    case 'promoters':
      printResult('Promoter Feedback (NPS 9-10)', await queryService.getPromoterFeedback({ daysBack }), 150);
      return;
    default:
      throw new FeedbackValidationError(
        `Unknown alert type "${type ?? ''}". Use churn, urgent, upsell, detractors or promoters`,
        'type',
      );
  }
}

async function cmdStats(services: Services, args: ParsedArgs): Promise<void> {
  const days = numberFlag(args, 'days') ?? 30;
  const stats = await services.queryService.getStatistics(days);

  console.log(`\nFeedback Statistics (last ${days} days):\n`);
  console.log(`Total feedback: ${stats.totalCount}`);
  if (stats.avgNps !== null) {
    console.log(`Average NPS: ${stats.avgNps.toFixed(1)}`);
  }
  printCounts('By Sentiment', stats.bySentiment);
  printCounts('By Source', stats.bySource);
  printCounts('By Topic', stats.byTopic, 10);
  printCounts('By Urgency', stats.byUrgency);
  printCounts('By Intent', stats.byIntent);
}

async function cmdTopic(services: Services, args: ParsedArgs): Promise<void> {
  const topic = args.positionals[0];
  if (!topic) {
    throw new FeedbackValidationError('topic needs a topic name as its first argument', 'topic');
  }
  const summary = await services.queryService.getTopicSummary(topic, numberFlag(args, 'days') ?? 30);
  console.log(`\nTopic Summary: ${topic}\n`);
  console.log(summary);
}

async function cmdReclassify(services: Services, args: ParsedArgs): Promise<void> {
  const batchSize = numberFlag(args, 'batch-size') ?? 100;
  const result = await services.queryService.reclassifyAll(batchSize, (done, total) => {
    if (done % 10 === 0 || done === total) {
      console.log(`  ${done}/${total}`);
    }
  });
  console.log(`Reclassified ${result.processed} items (${result.failed} failed)`);
}

const COMMANDS: Record<string, (services: Services, args: ParsedArgs) => Promise<void>> = {
  ingest: cmdIngest,
  import: cmdImport,
  search: cmdSearch,
  ask: cmdAsk,
  alerts: cmdAlerts,
  stats: cmdStats,
  topic: cmdTopic,
  reclassify: cmdReclassify,
};

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.command === 'serve') {
    await import('./index.js');
    return;
  }

  const handler = args.command ? COMMANDS[args.command] : undefined;
  if (!handler) {
    console.log(USAGE);
    process.exit(args.command ? 1 : 0);
  }

  const services = await createServices();
  try {
    await handler(services, args);
  } finally {
    await services.store.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof FeedbackValidationError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('[cli] Fatal error:', err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
