#!/usr/bin/env tsx
import { loadPipelineConfig } from '@/config/pipeline';
import { processPending } from '@/lib/pipeline/pending';
import { createPipelineDeps } from '@/lib/pipeline/process';

async function main() {
  const args = process.argv.slice(2);
  const maxArg = args.find((arg) => arg.startsWith('--max='));
  const max = maxArg ? Number(maxArg.split('=')[1]) : 0;
  const force = args.some((arg) => arg === '--force');

  const deps = createPipelineDeps(loadPipelineConfig());
  const report = await processPending(deps, { max: Number.isFinite(max) ? max : 0, force });
  console.log(JSON.stringify(report, null, 2));
  if (report.processed.some((entry) => entry.status === 'error')) {
    process.exitCode = 2;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
