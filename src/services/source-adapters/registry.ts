/**
 * Adapter Registry
 *
 * Holds the source adapters available to a resolver and orders them by the
 * configured priority.
 */

import type { AdapterSource } from '../../types/book.types.js';
import type { SourceAdapter } from './types.js';

export class AdapterRegistry {
  private adapters = new Map<AdapterSource, SourceAdapter>();

  constructor(adapters: SourceAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  /**
   * Register an adapter, replacing any previous one with the same name
   */
  register(adapter: SourceAdapter): void {
    this.adapters.set(adapter.name, adapter);
  }

  get(source: AdapterSource): SourceAdapter | undefined {
    return this.adapters.get(source);
  }

  getAll(): SourceAdapter[] {
    return Array.from(this.adapters.values());
  }

  has(source: AdapterSource): boolean {
    return this.adapters.has(source);
  }

  count(): number {
    return this.adapters.size;
  }

  /**
   * Adapters ordered by priority. Sources missing from the priority list
   * follow in registration order; disabled sources are dropped.
   */
  getByPriority(priority: AdapterSource[], enabled?: AdapterSource[]): SourceAdapter[] {
    const enabledSet = enabled ? new Set(enabled) : null;
    const ordered: SourceAdapter[] = [];
    const seen = new Set<AdapterSource>();

    for (const source of [...priority, ...this.adapters.keys()]) {
      const adapter = this.adapters.get(source);
      if (!adapter || seen.has(source)) continue;
      seen.add(source);
      if (enabledSet && !enabledSet.has(source)) continue;
      ordered.push(adapter);
    }

    return ordered;
  }
}

export default AdapterRegistry;
