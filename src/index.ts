import 'dotenv/config';
import { loadSettings } from './config/settings';
import { LLMClient } from './agents/llmClient';
import { createLLMProvider } from './agents/providers';
import { PromptBuilder, loadTemplateTable } from './agents/promptBuilder';
import { ScraperClient } from './ingest/scraper/client';
import { AnalysisOrchestrator } from './pipeline/runAnalysis';
import { QueryRefiner } from './pipeline/queryRefiner';
import { AnalysisRequestSchema, formatValidationErrors } from './pipeline/schemas';
import { LaneLimiter } from './utils/limiter';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.error('Usage: npm run dev -- "<research query>" [education-level] [task,...]');
    console.error('Education levels: beginner, intermediate, advanced');
    console.error('Tasks: summary, gap_analysis, explanation (default: all)');
    console.error('Example: npm run dev -- "graph neural networks for drug discovery" beginner');
    process.exit(1);
  }

  const [query, level = 'intermediate', tasks] = args;
  const parsed = AnalysisRequestSchema.safeParse({
    raw_query: query,
    user_profile: { education_level: level },
    tasks: tasks ? tasks.split(',').map((t) => t.trim()) : undefined,
  });
  if (!parsed.success) {
    console.error(`Invalid arguments: ${formatValidationErrors(parsed.error)}`);
    process.exit(1);
  }

  const settings = loadSettings();
  const limiter = new LaneLimiter({
    llm: settings.llm.concurrency,
    scraper: settings.scraper.concurrency,
  });
  const orchestrator = new AnalysisOrchestrator({
    config: settings.pipeline,
    scraper: new ScraperClient(settings.scraper, undefined, limiter),
    llm: new LLMClient(createLLMProvider(settings.llm), settings.llm, undefined, limiter),
    promptBuilder: new PromptBuilder(
      { tokenBudget: settings.pipeline.promptTokenBudget },
      loadTemplateTable(settings.pipeline.promptTemplatesPath)
    ),
    refiner: new QueryRefiner(),
  });

  const result = await orchestrator.analyze(parsed.data);
  if (!result.success) {
    console.error(`Analysis failed (${result.error.code}): ${result.error.message}`);
    for (const warning of result.error.warnings) {
      console.error(`  - ${warning}`);
    }
    process.exit(1);
  }

  console.log(JSON.stringify(result.output, null, 2));
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { AnalysisOrchestrator } from './pipeline/runAnalysis';
export { buildServer } from './api/server';
export { loadSettings } from './config/settings';
export { PipelineError } from './pipeline/errors';
export * from './pipeline/types';
