import type { PageFetcher, SourceAdapter } from '../types/adapter.js';
import type { TimezoneResolver } from '../pipeline/reference-data.js';
import { AtTheRacesAdapter } from './attheraces.js';
import { HarnessAustraliaAdapter } from './harness-australia.js';
import { Rpb2bAdapter } from './rpb2b.js';
import { SportingLifeGreyhoundsAdapter } from './sporting-life-greyhounds.js';
import { StandardbredCanadaAdapter } from './standardbred-canada.js';

export type AdapterRegistry = Map<string, SourceAdapter>;

/** Every shipped adapter, keyed by id, in scan order. */
export function createAdapters(fetcher: PageFetcher, timezones: TimezoneResolver): AdapterRegistry {
  const adapters: AdapterRegistry = new Map();

  function register(adapter: SourceAdapter): void {
    adapters.set(adapter.config.id, adapter);
  }

  register(new AtTheRacesAdapter(fetcher, timezones));
  register(new SportingLifeGreyhoundsAdapter(fetcher, timezones));
  register(new HarnessAustraliaAdapter(fetcher, timezones));
  register(new StandardbredCanadaAdapter(fetcher, timezones));
  register(new Rpb2bAdapter(fetcher, timezones));

  return adapters;
}

export function getAdapter(registry: AdapterRegistry, id: string): SourceAdapter {
  const adapter = registry.get(id);
  if (!adapter) throw new Error(`Unknown adapter: ${id}`);
  return adapter;
}

export function getAllAdapters(registry: AdapterRegistry): SourceAdapter[] {
  return Array.from(registry.values());
}

/** Narrows the registry to the listed ids; an empty list keeps everything. */
export function selectAdapters(registry: AdapterRegistry, only: readonly string[]): SourceAdapter[] {
  if (only.length === 0) return getAllAdapters(registry);
  return only.map((id) => getAdapter(registry, id));
}
