import type { PaneRecord } from '../types/index.js';
import type { IPaneSource } from '../types/interfaces.js';
import { PaneRegistryBuilder } from './registry.js';

/**
 * Lists panes from the multiplexer and keeps the ones running an agent.
 * A DiscoveryError from the source reaches the caller unchanged.
 */
export class PaneDiscovery {
  constructor(
    private source: IPaneSource,
    private builder: PaneRegistryBuilder,
  ) {}

  discover(): PaneRecord[] {
    return this.builder.build(this.source.listPanesRaw());
  }
}
