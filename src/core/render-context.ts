import { policyFor } from '@tfweave/block-core';

import { LabelRegistry } from './label-registry.js';
import { mergeFragment } from './merger.js';
import { VariableStore } from './variables.js';

import type { ConfigMap, ConfigValue, Fragment } from '@tfweave/block-core';

/**
 * Everything one render run shares: claimed labels, the merged tree, variables,
 * per-source provenance and the export tables of finished sources.
 * Built at run start and dropped at run end; nothing here is global.
 */
export class RenderContext {
  readonly registry = new LabelRegistry();
  readonly variables = new VariableStore();
  readonly tree: ConfigMap = {};

  private readonly provenance = new Map<string, Fragment[]>();
  private readonly exportTables = new Map<string, ReadonlyMap<string, ConfigValue>>();
  /** Values sources whose artifact Terraform reads, with their precedence rank. */
  private readonly valueRanks = new Map<string, number>();

  /** Commit one fragment: claim its label, record provenance, merge it into the shared state. */
  commit(source: string, fragment: Fragment): void {
    this.registry.claim(fragment, source);

    const own = this.provenance.get(source);
    if (own) own.push(fragment);
    else this.provenance.set(source, [fragment]);

    if (policyFor(fragment.category).destination === 'tree') {
      mergeFragment(this.tree, fragment, this.registry.owners(fragment));
      if (fragment.category === 'variable') {
        this.variables.defineFrom(fragment, source);
      }
      return;
    }

    const rank = this.valueRanks.get(source);
    if (rank !== undefined) {
      this.variables.setValue({ name: fragment.type, value: fragment.body, source, rank });
    }
  }

  fragmentsOf(source: string): readonly Fragment[] {
    return this.provenance.get(source) ?? [];
  }

  publishExports(source: string, table: ReadonlyMap<string, ConfigValue>): void {
    this.exportTables.set(source, new Map(table));
  }

  exportsOf(source: string): ReadonlyMap<string, ConfigValue> | undefined {
    return this.exportTables.get(source);
  }

  setValueRank(source: string, rank: number): void {
    this.valueRanks.set(source, rank);
  }

  contributesValues(source: string): boolean {
    return this.valueRanks.has(source);
  }

  allExports(): Record<string, Record<string, ConfigValue>> {
    const out: Record<string, Record<string, ConfigValue>> = {};
    for (const [source, table] of this.exportTables) {
      out[source] = Object.fromEntries(table);
    }
    return out;
  }
}
