/**
 * Disposable filesystem store.
 *
 * Layout: `<base>/<flow>/<runId>/<step>/output.bin.gz` for values (gzip over
 * v8 serialization) and `<base>/<flow>/<runId>/<step>/map_manifest.json`
 * for sequence manifests.
 *
 * Values come back as structured clones: class instances are read back as
 * plain objects. The local engine hands outputs between steps in memory and
 * only persists them here.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as v8 from 'v8';
import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';
import { StoreError, formatIssues } from '../errors.js';
import { ManifestSchema, type DataStore, type ManifestItem, type StoreKey, type StoredKind } from './types.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const FILE_NAMES: Record<StoredKind, string> = {
  output: 'output.bin.gz',
  manifest: 'map_manifest.json',
};

export class LocalStore implements DataStore {
  private readonly runDirs = new Set<string>();

  private constructor(
    readonly baseDir: string,
    private readonly ownsBaseDir: boolean
  ) {}

  /**
   * Open a store under `baseDir`, or under a fresh temporary directory.
   */
  static async create(baseDir?: string): Promise<LocalStore> {
    if (baseDir) {
      const resolved = path.resolve(baseDir);
      await fs.promises.mkdir(resolved, { recursive: true });
      return new LocalStore(resolved, false);
    }
    const temp = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'stepline-'));
    return new LocalStore(temp, true);
  }

  locate(key: StoreKey, kind: StoredKind): string {
    return path.join(this.runDir(key), ...key.stepName.split('/'), FILE_NAMES[kind]);
  }

  async write(key: StoreKey, value: unknown): Promise<string> {
    const location = this.locate(key, 'output');
    let data: Buffer;
    try {
      data = await gzipAsync(v8.serialize(value));
    } catch (error) {
      throw new StoreError(
        'IO_ERROR',
        location,
        `Cannot serialize output of step '${key.stepName}': ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    await this.writeFile(location, data);
    return location;
  }

  async writeManifest(key: StoreKey, items: readonly ManifestItem[]): Promise<string> {
    const location = this.locate(key, 'manifest');
    await this.writeFile(location, JSON.stringify(items));
    return location;
  }

  async read(location: string): Promise<unknown> {
    const data = await this.readFile(location);
    return v8.deserialize(await gunzipAsync(data));
  }

  async readManifest(location: string): Promise<ManifestItem[]> {
    const text = (await this.readFile(location)).toString('utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StoreError('IO_ERROR', location, `Manifest is not valid JSON: ${location}`, { cause: error });
    }
    const result = ManifestSchema.safeParse(raw);
    if (!result.success) {
      throw new StoreError('IO_ERROR', location, `Invalid manifest ${location}: ${formatIssues(result.error.issues)}`);
    }
    return result.data;
  }

  async exists(location: string): Promise<boolean> {
    try {
      await fs.promises.access(location);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Remove everything this store wrote. A temporary base directory is removed entirely.
   */
  async cleanup(): Promise<void> {
    if (this.ownsBaseDir) {
      await fs.promises.rm(this.baseDir, { recursive: true, force: true });
      return;
    }
    for (const dir of this.runDirs) {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
    this.runDirs.clear();
  }

  private runDir(key: StoreKey): string {
    return path.join(this.baseDir, key.flowName, key.runId);
  }

  private async writeFile(location: string, data: Buffer | string): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(location), { recursive: true });
      await fs.promises.writeFile(location, data);
    } catch (error) {
      throw new StoreError('IO_ERROR', location, `Failed to write ${location}`, { cause: error });
    }
    this.trackRunDir(location);
  }

  private trackRunDir(location: string): void {
    const relative = path.relative(this.baseDir, location).split(path.sep);
    if (relative.length >= 2) {
      this.runDirs.add(path.join(this.baseDir, relative[0], relative[1]));
    }
  }

  private async readFile(location: string): Promise<Buffer> {
    try {
      return await fs.promises.readFile(location);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new StoreError('NOT_FOUND', location, `Nothing stored at ${location}`, { cause: error });
      }
      throw new StoreError('IO_ERROR', location, `Failed to read ${location}`, { cause: error });
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
