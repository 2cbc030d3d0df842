import { errorMessage, UploadError } from '@/lib/errors';
import { exponentialBackoff, withRetry } from '@/lib/retry';
import type { RetryPolicy, Sleep } from '@/lib/retry';
import type { ContainerName, ObjectStore, StoreBody } from '@/lib/storage/objectStore';

const DEFAULT_POLICY: RetryPolicy = { maxAttempts: 3, delayFn: exponentialBackoff(250, 2000) };

/** Retries transient write failures and surfaces the last one as an `UploadError`. */
export class RetryingObjectStore implements ObjectStore {
  constructor(
    private readonly inner: ObjectStore,
    private readonly policy: RetryPolicy = DEFAULT_POLICY,
    private readonly sleep?: Sleep
  ) {}

  readText(container: ContainerName, name: string): Promise<string | null> {
    return this.inner.readText(container, name);
  }

  readBytes(container: ContainerName, name: string): Promise<Uint8Array | null> {
    return this.inner.readBytes(container, name);
  }

  async writeBytes(container: ContainerName, name: string, body: StoreBody, contentType?: string): Promise<void> {
    try {
      await withRetry(
        async (attempt) => {
          try {
            await this.inner.writeBytes(container, name, body, contentType);
          } catch (err) {
            console.warn(`[store] write ${container}/${name} attempt ${attempt} failed: ${errorMessage(err)}`);
            throw err;
          }
        },
        this.policy,
        { sleep: this.sleep, shouldRetry: () => true }
      );
    } catch (err) {
      throw new UploadError(`Failed to write ${container}/${name}: ${errorMessage(err)}`, { cause: err });
    }
  }

  exists(container: ContainerName, name: string): Promise<boolean> {
    return this.inner.exists(container, name);
  }

  listNames(container: ContainerName, prefix?: string): Promise<string[]> {
    return this.inner.listNames(container, prefix);
  }

  delete(container: ContainerName, name: string): Promise<void> {
    return this.inner.delete(container, name);
  }

  getReadUrl(container: ContainerName, name: string): Promise<string> {
    return this.inner.getReadUrl(container, name);
  }
}
