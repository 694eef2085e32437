import { InvalidJobsModuleError } from '../errors';
import type { JobHandler, JobHandlers } from './runner';

const loadedModules = new Map<string, Promise<JobHandlers>>();

/**
 * Load the job handlers exported by a module. The module may export them as
 * `jobs`, as its default export, or as plain named exports.
 */
export async function loadJobHandlers(modulePath: string): Promise<JobHandlers> {
  let handlers = loadedModules.get(modulePath);
  if (!handlers) {
    handlers = importJobHandlers(modulePath);
    loadedModules.set(modulePath, handlers);
    handlers.catch(() => loadedModules.delete(modulePath));
  }
  return handlers;
}

async function importJobHandlers(modulePath: string): Promise<JobHandlers> {
  let loaded: unknown;
  try {
    loaded = await import(modulePath);
  } catch (e) {
    throw new InvalidJobsModuleError(modulePath, e instanceof Error ? e.message : String(e));
  }
  const exported = pickHandlers(loaded);
  if (!exported) {
    throw new InvalidJobsModuleError(modulePath, 'it does not export an object of job handlers');
  }
  return toJobHandlers(modulePath, exported);
}

function pickHandlers(loaded: unknown): object | null {
  const defaultExport = property(loaded, 'default');
  const candidates = [property(loaded, 'jobs'), property(defaultExport, 'jobs'), defaultExport, loaded];
  for (const candidate of candidates) {
    if (isObject(candidate)) { return candidate; }
  }
  return null;
}

function property(value: unknown, key: string): unknown {
  return isObject(value) ? Reflect.get(value, key) : undefined;
}

function toJobHandlers(modulePath: string, exported: object): JobHandlers {
  const handlers: { [name: string]: JobHandler } = {};
  for (const [name, value] of Object.entries(exported)) {
    if (name === 'default' || name === '__esModule') { continue; }
    if (typeof value !== 'function') {
      throw new InvalidJobsModuleError(modulePath, `export '${name}' is not a function`);
    }
    handlers[name] = (args: unknown): unknown => Reflect.apply(value, undefined, [args]);
  }
  if (Object.keys(handlers).length === 0) {
    throw new InvalidJobsModuleError(modulePath, 'it exports no job handlers');
  }
  return handlers;
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}
