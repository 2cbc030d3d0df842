import type { ContainerName, ObjectStore, StoreBody } from '@/lib/storage/objectStore';
import { guessContentType, toBytes } from '@/lib/storage/objectStore';

type StoredBlob = { body: Uint8Array; contentType: string };

export class InMemoryObjectStore implements ObjectStore {
  private readonly blobs = new Map<string, StoredBlob>();

  private key(container: ContainerName, name: string): string {
    return `${container}/${name}`;
  }

  async readBytes(container: ContainerName, name: string): Promise<Uint8Array | null> {
    return this.blobs.get(this.key(container, name))?.body ?? null;
  }

  async readText(container: ContainerName, name: string): Promise<string | null> {
    const blob = this.blobs.get(this.key(container, name));
    return blob ? new TextDecoder().decode(blob.body) : null;
  }

  async writeBytes(container: ContainerName, name: string, body: StoreBody, contentType?: string): Promise<void> {
    this.blobs.set(this.key(container, name), {
      body: toBytes(body),
      contentType: contentType ?? guessContentType(name)
    });
  }

  async exists(container: ContainerName, name: string): Promise<boolean> {
    return this.blobs.has(this.key(container, name));
  }

  async listNames(container: ContainerName, prefix = ''): Promise<string[]> {
    const scope = this.key(container, prefix);
    const start = `${container}/`.length;
    return [...this.blobs.keys()]
      .filter((key) => key.startsWith(scope))
      .map((key) => key.slice(start))
      .sort();
  }

  async delete(container: ContainerName, name: string): Promise<void> {
    this.blobs.delete(this.key(container, name));
  }

  async getReadUrl(container: ContainerName, name: string): Promise<string> {
    return `memory://${container}/${name}`;
  }

  contentTypeOf(container: ContainerName, name: string): string | null {
    return this.blobs.get(this.key(container, name))?.contentType ?? null;
  }
}
