import { formatLabelKey, policyFor } from '@tfweave/block-core';

import { DuplicateBlockError } from './errors.js';

import type { Fragment } from '@tfweave/block-core';

export type LabelKeyParts = Pick<Fragment, 'category' | 'type' | 'label'>;

/**
 * Tracks which source owns each label key for the length of one run.
 * Non-mergeable categories allow a single owner; mergeable ones record every owner in claim order.
 */
export class LabelRegistry {
  private readonly claims = new Map<string, string[]>();

  claim(key: LabelKeyParts, owner: string): void {
    const id = formatLabelKey(key);
    const owners = this.claims.get(id);
    if (!owners) {
      this.claims.set(id, [owner]);
      return;
    }
    if (owners.includes(owner)) return;
    if (!policyFor(key.category).mergeable) {
      throw new DuplicateBlockError(id, owners[0] ?? owner, owner);
    }
    owners.push(owner);
  }

  owners(key: LabelKeyParts): readonly string[] {
    return this.claims.get(formatLabelKey(key)) ?? [];
  }

  get size(): number {
    return this.claims.size;
  }
}
