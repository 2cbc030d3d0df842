import { errorMessage } from '@/lib/errors';
import { isAbortError } from '@/lib/retry';
import { CONTAINERS } from '@/lib/storage/objectStore';
import { manifestBlobName } from '@/lib/storyboard/manifest';
import { processDocument } from '@/lib/pipeline/process';
import type { ContentSource, PipelineDeps } from '@/lib/pipeline/process';

export type PendingEntry =
  | { doc: string; status: 'processed'; source: ContentSource; manifestPath: string }
  | { doc: string; status: 'skipped' }
  | { doc: string; status: 'error'; error: string };

export type PendingReport = {
  timestampUtc: string;
  totalReturned: number;
  forced: boolean;
  processed: PendingEntry[];
};

/**
 * Sweeps `uploaded-docs` in name order. Documents with a manifest are skipped
 * unless `force`; `max` caps the number of runs attempted (0 means no cap).
 */
export async function processPending(
  deps: PipelineDeps,
  options: { max?: number; force?: boolean; signal?: AbortSignal } = {}
): Promise<PendingReport> {
  const max = Math.max(0, Math.floor(options.max ?? 0));
  const force = options.force ?? false;
  const now = deps.now ?? (() => new Date());
  const names = await deps.store.listNames(CONTAINERS.uploads);
  const entries: PendingEntry[] = [];
  let attempted = 0;

  for (const doc of names) {
    if (max > 0 && attempted >= max) break;
    if (!force && (await deps.store.exists(CONTAINERS.manifests, manifestBlobName(doc)))) {
      entries.push({ doc, status: 'skipped' });
      continue;
    }
    attempted += 1;
    try {
      const rawText = await deps.store.readText(CONTAINERS.uploads, doc);
      const outcome = await processDocument({ name: doc, rawText }, deps, { signal: options.signal });
      entries.push({ doc, status: 'processed', source: outcome.source, manifestPath: outcome.manifestPath });
    } catch (err) {
      if (isAbortError(err) || options.signal?.aborted) throw err;
      console.error(`[pending] ${doc}: ${errorMessage(err)}`);
      entries.push({ doc, status: 'error', error: errorMessage(err) });
    }
  }

  console.info(
    `[pending] uploads=${names.length} attempted=${attempted} skipped=${entries.filter((e) => e.status === 'skipped').length} forced=${force}`
  );
  return { timestampUtc: now().toISOString(), totalReturned: entries.length, forced: force, processed: entries };
}
