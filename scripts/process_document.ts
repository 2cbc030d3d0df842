#!/usr/bin/env tsx
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { loadPipelineConfig } from '@/config/pipeline';
import { isGenerationError } from '@/lib/errors';
import { createPipelineDeps, processDocument } from '@/lib/pipeline/process';

async function main() {
  const args = process.argv.slice(2);
  const file = args.find((arg) => !arg.startsWith('--'));
  if (!file) {
    console.error('Usage: npm run process -- <file.txt|file.md> [--name=<document name>]');
    process.exit(1);
  }
  const nameArg = args.find((arg) => arg.startsWith('--name='));
  const name = nameArg ? nameArg.slice('--name='.length) : basename(file);

  const config = loadPipelineConfig();
  const deps = createPipelineDeps(config);
  const rawText = await readFile(file, 'utf8');

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('Interrupted')));

  const outcome = await processDocument({ name, rawText, contentType: 'text/plain' }, deps, { signal: controller.signal });
  console.error(`Estimated cost: $${outcome.cost.total_cost_usd.toFixed(4)} (${outcome.cost.total_tokens} tokens)`);
  console.log(
    JSON.stringify(
      {
        source: outcome.source,
        manifestPath: outcome.manifestPath,
        quizPath: outcome.quizPath,
        scenes: outcome.manifest.sceneCount,
        questions: outcome.quiz.questions.length,
        video: outcome.manifest.videoAsset.status
      },
      null,
      2
    )
  );
}

main().catch((err) => {
  if (isGenerationError(err)) {
    console.error(`Generation failed: ${err.message}`);
    for (const issue of err.issues) console.error(`  - ${issue}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
