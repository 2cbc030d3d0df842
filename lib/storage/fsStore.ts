import { mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ContainerName, ObjectStore, StoreBody } from '@/lib/storage/objectStore';
import { toBytes } from '@/lib/storage/objectStore';

function isMissing(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** Stores each container as a directory under `root`; blob names map to relative paths. */
export class FileSystemObjectStore implements ObjectStore {
  private readonly root: string;
  private readonly publicBaseUrl: string | null;

  constructor(options: { root: string; publicBaseUrl?: string | null }) {
    this.root = resolve(options.root);
    this.publicBaseUrl = options.publicBaseUrl ? options.publicBaseUrl.replace(/\/+$/, '') : null;
  }

  private pathFor(container: ContainerName, name: string): string {
    const dir = join(this.root, container);
    const full = resolve(dir, name);
    if (!full.startsWith(`${dir}${sep}`)) {
      throw new Error(`Blob name escapes container '${container}': ${name}`);
    }
    return full;
  }

  async readBytes(container: ContainerName, name: string): Promise<Uint8Array | null> {
    try {
      const data = await readFile(this.pathFor(container, name));
      return new Uint8Array(data);
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async readText(container: ContainerName, name: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(container, name), 'utf8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  /** Files carry no metadata, so the content type hint is not kept. */
  async writeBytes(container: ContainerName, name: string, body: StoreBody, _contentType?: string): Promise<void> {
    const path = this.pathFor(container, name);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, toBytes(body));
  }

  async exists(container: ContainerName, name: string): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(container, name));
      return info.isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async delete(container: ContainerName, name: string): Promise<void> {
    await rm(this.pathFor(container, name), { force: true });
  }

  async listNames(container: ContainerName, prefix = ''): Promise<string[]> {
    const names: string[] = [];
    const walk = async (dir: string, base: string) => {
      const entries = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
        if (isMissing(err)) return null;
        throw err;
      });
      if (!entries) return;
      for (const entry of entries) {
        const rel = base ? `${base}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
          await walk(join(dir, entry.name), rel);
        } else if (entry.isFile()) {
          names.push(rel);
        }
      }
    };
    await walk(join(this.root, container), '');
    return names.filter((name) => name.startsWith(prefix)).sort();
  }

  async getReadUrl(container: ContainerName, name: string): Promise<string> {
    if (this.publicBaseUrl) {
      const encoded = name.split('/').map(encodeURIComponent).join('/');
      return `${this.publicBaseUrl}/${container}/${encoded}`;
    }
    return pathToFileURL(this.pathFor(container, name)).href;
  }
}
