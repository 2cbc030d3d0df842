#!/usr/bin/env tsx
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { loadPipelineConfig } from '@/config/pipeline';
import { getProcessingStatus, saveUpload } from '@/lib/pipeline/intake';
import { createPipelineDeps } from '@/lib/pipeline/process';

async function main() {
  const [file, command] = process.argv.slice(2);
  if (!file) {
    console.error('Usage: npm run upload -- <file> | npm run upload -- <document name> --status');
    process.exit(1);
  }
  const { store } = createPipelineDeps(loadPipelineConfig());

  if (command === '--status') {
    console.log(JSON.stringify(await getProcessingStatus(store, file), null, 2));
    return;
  }
  const saved = await saveUpload(store, basename(file), await readFile(file, 'utf8'));
  console.log(JSON.stringify(saved, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
