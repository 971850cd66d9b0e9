import { describe, expect, it } from 'vitest';
import { GetDisksInput, GetStorageUsageInput, GetZfsPoolStatusInput, ListZfsPoolsInput } from './tools.js';

describe('tool input schemas', () => {
  it('leaves node optional for cluster-wide queries', () => {
    expect(ListZfsPoolsInput.parse({})).toEqual({});
    expect(ListZfsPoolsInput.parse({ node: 'pve1', output: 'json' })).toEqual({
      node: 'pve1',
      output: 'json',
    });
  });

  it('requires node and pool for pool status', () => {
    expect(GetZfsPoolStatusInput.safeParse({ node: 'pve1' }).success).toBe(false);
    expect(GetZfsPoolStatusInput.safeParse({ node: 'pve1', pool: 'tank' }).success).toBe(true);
  });

  it('rejects an empty node name', () => {
    expect(GetStorageUsageInput.safeParse({ node: '' }).success).toBe(false);
  });

  it('rejects an unknown output mode', () => {
    expect(GetDisksInput.safeParse({ node: 'pve1', output: 'xml' }).success).toBe(false);
  });
});
