#!/usr/bin/env node
import 'dotenv/config';
import { dateOptionsOf } from './callBuilder.js';
import { loadConfig } from './config.js';
import { reconcile } from './dedupe.js';
import { crawlAll, createHttpDeps } from './fetchSources.js';
import { createOpenAIEnricher } from './gptClient.js';
import { createCall } from './recordMerge.js';
import { loadSnapshot, saveSnapshot } from './snapshotStore.js';
import { loadSources } from './sources.js';

async function main() {
  const config = loadConfig();
  const sources = loadSources(config.SOURCES_FILE);
  const now = new Date();

  const dateWindow = { pastDays: config.DATE_WINDOW_PAST_DAYS, futureDays: config.DATE_WINDOW_FUTURE_DAYS };
  const enricher = createOpenAIEnricher(config, { now, window: dateWindow });
  const deps = createHttpDeps(config, enricher, now);

  console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
  console.log('🎯 Funding Calls Aggregator - Run Started');
  console.log(`📅 ${now.toISOString()}`);
  console.log(`🏛️  Agencies: ${sources.agencies.length}`);
  console.log(`🤖 AI fallback: ${enricher ? config.OPENAI_MODEL : 'disabled'}`);
  console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n');

  const existing = loadSnapshot(config.OUTPUT_FILE);
  const { calls, stats } = await crawlAll(sources.agencies, deps);
  const fresh = [...sources.recurring.map((call) => createCall(call)), ...calls];

  const merged = reconcile(existing, fresh, dateOptionsOf(deps));
  saveSnapshot(config.OUTPUT_FILE, merged, now);

  console.log('\n' + '═'.repeat(60));
  console.log('📊 RUN SUMMARY');
  console.log('─'.repeat(60));
  console.log(`   Agencies:           ${stats.sources}`);
  console.log(`   Agencies failed:    ${stats.failedSources}`);
  console.log(`   Candidate links:    ${stats.candidates}`);
  console.log(`   Calls built:        ${stats.built}`);
  console.log(`   Skipped:            ${stats.skipped}`);
  console.log(`   Errors:             ${stats.errors}`);
  console.log(`   Previously stored:  ${existing.length}`);
  console.log(`   Saved:              ${merged.length} → ${config.OUTPUT_FILE}`);
  console.log('═'.repeat(60) + '\n');

  if (stats.errors === 0 && stats.failedSources === 0) {
    console.log('✅ Run completed successfully\n');
  } else {
    console.log('⚠️  Run completed with errors\n');
  }
}

main().catch((error: unknown) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
