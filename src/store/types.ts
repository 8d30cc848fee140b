/**
 * Intermediate storage used by the local engine to hand values from one
 * step to the next.
 */

import { z } from 'zod';

export interface StoreKey {
  flowName: string;
  runId: string;
  /** Step name, or `<step>/<index>` for a single fan-out element */
  stepName: string;
}

export const ManifestItemSchema = z.object({
  index: z.number().int().min(0),
  location: z.string().min(1),
});

/**
 * One element of a sequence output, in the order the step returned it.
 */
export type ManifestItem = z.infer<typeof ManifestItemSchema>;

export const ManifestSchema = z.array(ManifestItemSchema);

export type StoredKind = 'output' | 'manifest';

export interface DataStore {
  /** Persist a value and return its location */
  write(key: StoreKey, value: unknown): Promise<string>;
  /** Persist the ordered element list of a sequence output */
  writeManifest(key: StoreKey, items: readonly ManifestItem[]): Promise<string>;
  /** @throws StoreError NOT_FOUND when nothing is stored at `location` */
  read(location: string): Promise<unknown>;
  readManifest(location: string): Promise<ManifestItem[]>;
  /** Location a value of the given kind is (or would be) stored at */
  locate(key: StoreKey, kind: StoredKind): string;
  exists(location: string): Promise<boolean>;
  cleanup(): Promise<void>;
}

export function elementKey(key: StoreKey, index: number): StoreKey {
  return { ...key, stepName: `${key.stepName}/${index}` };
}
