import { describe, it, expect } from 'vitest';
import { inventoryFromRecord, reconcileClaim, reconcileClaims } from './index';

const inventory = inventoryFromRecord({
  create_order: 'def create_order(request)',
  OrderModel: 'class OrderModel(Model)',
});

describe('reconcileClaim', () => {
  it('should accept an exists claim for a present symbol', () => {
    expect(
      reconcileClaim({ claimRef: 'docs/api.md#orders', symbol: 'OrderModel', expected: 'exists' }, inventory)
    ).toBeNull();
  });

  it('should report an absent symbol', () => {
    expect(
      reconcileClaim({ claimRef: 'docs/api.md#refunds', symbol: 'refund_order', expected: 'exists' }, inventory)
    ).toEqual({
      claimRef: 'docs/api.md#refunds',
      symbol: 'refund_order',
      expected: 'exists',
      observed: '<absent>',
      category: 'absent',
      confidence: 'high',
      suggestion: 'add refund_order to the code, or drop it from the documentation',
    });
  });

  it('should compare properties with whitespace collapsed', () => {
    expect(
      reconcileClaim(
        { claimRef: 'docs/api.md#orders', symbol: 'create_order', expected: '  def  create_order(request) ' },
        inventory
      )
    ).toBeNull();
  });

  it('should report a mismatch with the observed property', () => {
    expect(
      reconcileClaim(
        { claimRef: 'docs/api.md#orders', symbol: 'create_order', expected: 'def create_order(request, user)' },
        inventory
      )
    ).toEqual({
      claimRef: 'docs/api.md#orders',
      symbol: 'create_order',
      expected: 'def create_order(request, user)',
      observed: 'def create_order(request)',
      category: 'mismatch',
      confidence: 'high',
      suggestion: 'change the code to match the documentation, or document def create_order(request)',
    });
  });

  it('should report a malformed claim as unverified', () => {
    expect(reconcileClaim({ claimRef: 'docs/api.md#x', symbol: ' ', expected: 'exists' }, inventory)).toEqual({
      claimRef: 'docs/api.md#x',
      symbol: ' ',
      expected: 'exists',
      observed: '<unverified>',
      category: 'analysis_incomplete',
      confidence: 'low',
      suggestion: 'check the claim by hand',
    });
  });
});

describe('reconcileClaims', () => {
  it('should keep claim order and name claims without a ref by index', () => {
    const candidates = reconcileClaims(
      [
        { claimRef: 'docs/a.md', symbol: 'OrderModel', expected: 'exists' },
        { claimRef: '', symbol: 'create_order', expected: 'exists' },
        { claimRef: 'docs/c.md', symbol: 'cancel_order', expected: 'exists' },
      ],
      inventory
    );

    expect(candidates.map((c) => [c.claimRef, c.category])).toEqual([
      ['claims[1]', 'analysis_incomplete'],
      ['docs/c.md', 'absent'],
    ]);
  });

  it('should prefix refs of unnamed claims with their source', () => {
    const candidates = reconcileClaims([{ claimRef: ' ', symbol: 'x', expected: 'exists' }], inventory, 'docs/a.md');

    expect(candidates.map((c) => c.claimRef)).toEqual(['docs/a.md#claims[0]']);
  });

  it('should report every mismatching claim about one symbol', () => {
    const candidates = reconcileClaims(
      [
        { claimRef: 'docs/api.md', symbol: 'create_order', expected: 'def create_order(user, items)' },
        { claimRef: 'docs/api.md', symbol: 'create_order', expected: 'returns Order' },
      ],
      inventory
    );

    expect(candidates.map((c) => c.expected)).toEqual(['def create_order(user, items)', 'returns Order']);
  });
});
