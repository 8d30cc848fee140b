import * as path from 'path';
import { pathToFileURL } from 'url';
import { isFlow, type Flow } from '../flow.js';
import { isRecord, toKebabCase } from '../utils.js';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export const importModule: ModuleImporter = async (specifier) => {
  const loaded: unknown = await import(specifier);
  return loaded;
};

/**
 * Every flow exported by a module namespace, keyed by flow name.
 */
export function collectFlows(namespace: unknown): Map<string, Flow> {
  const flows = new Map<string, Flow>();
  if (!isRecord(namespace)) {
    return flows;
  }
  for (const value of Object.values(namespace)) {
    if (isFlow(value) && !flows.has(value.flowName)) {
      flows.set(value.flowName, value);
    }
  }
  return flows;
}

/**
 * Pick one flow. With a single export no name is needed.
 * @throws Error when the name is unknown or the choice is ambiguous
 */
export function selectFlow(flows: Map<string, Flow>, name?: string): Flow {
  const available = [...flows.keys()].sort();
  if (flows.size === 0) {
    throw new Error('No flows exported by the module');
  }
  if (name !== undefined) {
    const match = flows.get(name) ?? [...flows.values()].find(candidate => candidate.flowName === toKebabCase(name));
    if (!match) {
      throw new Error(`Flow '${name}' not found; available: ${available.join(', ')}`);
    }
    return match;
  }
  if (flows.size > 1) {
    throw new Error(`Module exports several flows (${available.join(', ')}); pick one with --flow`);
  }
  return [...flows.values()][0];
}

/**
 * Import a flow module from a file path and pick a flow from it.
 */
export async function loadFlow(
  modulePath: string,
  name: string | undefined,
  importer: ModuleImporter = importModule
): Promise<Flow> {
  const specifier = pathToFileURL(path.resolve(modulePath)).href;
  let namespace: unknown;
  try {
    namespace = await importer(specifier);
  } catch (error) {
    throw new Error(`Failed to load flow module ${modulePath}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  return selectFlow(collectFlows(namespace), name);
}
