/**
 * Access-Path Resolver Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveAccessPath } from '../resolver.js';
import { describeAccessPath } from '../access-path.js';
import type { ResolvedAccessPath, ScanPolicy } from '../access-path.js';
import { parseMethodName } from '../../parser/method-name.js';
import { bindPredicateTree } from '../../parser/binding.js';
import { defineEntity } from '../../metadata/entity.js';
import type { EntityKeyMetadata } from '../../metadata/entity.js';
import {
  ScanCountNotEnabledError,
  ScanNotEnabledError,
  UnsupportedOperationError,
} from '../../error/index.js';
import { customerSchema, orderSchema, playlistSchema } from '../../__tests__/fixtures.js';

const customers = defineEntity(customerSchema);
const orders = defineEntity(orderSchema);
const playlists = defineEntity(playlistSchema);

const NO_SCAN: ScanPolicy = { enableScan: false, enableScanCount: false };
const SCAN: ScanPolicy = { enableScan: true, enableScanCount: true };

function resolve(methodName: string, metadata: EntityKeyMetadata, policy: ScanPolicy = NO_SCAN): ResolvedAccessPath {
  return resolveAccessPath(bindPredicateTree(parseMethodName(methodName), metadata), metadata, policy);
}

function keyProperties(path: ResolvedAccessPath): string[] {
  return path.keyConditions.map((predicate) => predicate.property);
}

function filterProperties(path: ResolvedAccessPath): string[] {
  return path.residualFilters.map((predicate) => predicate.property);
}

describe('resolveAccessPath', () => {
  describe('direct load', () => {
    it('should load a simple key entity by its partition key', () => {
      const path = resolve('findByCustomerId', customers);

      expect(path.kind).toBe('DIRECT_LOAD');
      expect(keyProperties(path)).toEqual(['customerId']);
      expect(path.compositeIdLoad).toBe(false);
    });

    it('should load a composite key entity by both keys in any order', () => {
      expect(keyProperties(resolve('findByCustomerIdAndOrderId', orders))).toEqual(['customerId', 'orderId']);

      const reversed = resolve('findByOrderIdAndCustomerId', orders);
      expect(reversed.kind).toBe('DIRECT_LOAD');
      expect(keyProperties(reversed)).toEqual(['customerId', 'orderId']);
    });

    it('should load through the composite id', () => {
      const path = resolve('findByPlaylistId', playlists);

      expect(path.kind).toBe('DIRECT_LOAD');
      expect(path.compositeIdLoad).toBe(true);
    });

    it('should load through nested composite id fields', () => {
      const path = resolve('findByPlaylistIdUserNameAndPlaylistIdPlaylistName', playlists);

      expect(path.kind).toBe('DIRECT_LOAD');
      expect(path.compositeIdLoad).toBe(false);
      expect(keyProperties(path)).toEqual(['userName', 'playlistName']);
    });

    it('should serve count and exists methods by direct load', () => {
      expect(resolve('countByCustomerIdAndOrderId', orders).kind).toBe('DIRECT_LOAD');
      expect(resolve('existsByCustomerId', customers).kind).toBe('DIRECT_LOAD');
    });

    it('should not load directly with a limit', () => {
      expect(resolve('findTop1ByCustomerIdAndOrderId', orders).kind).toBe('PRIMARY_SORT_QUERY');
    });

    it('should prefer the direct load over a local index', () => {
      expect(resolve('findByCustomerIdAndOrderId', orders).kind).toBe('DIRECT_LOAD');
    });

    it('should reject the composite id combined with other criteria', () => {
      expect(() => resolve('findByPlaylistIdAndDisplayName', playlists)).toThrow(UnsupportedOperationError);
    });
  });

  describe('primary sort key query', () => {
    it('should query with a sort key condition', () => {
      const path = resolve('findByCustomerIdAndOrderIdGreaterThan', orders);

      expect(path.kind).toBe('PRIMARY_SORT_QUERY');
      expect(path.indexName).toBeUndefined();
      expect(keyProperties(path)).toEqual(['customerId', 'orderId']);
      expect(path.rangeKey).toBe('orderId');
    });

    it('should win over a local index and filter the rest', () => {
      const path = resolve('findByCustomerIdAndOrderIdAndOrderDateAfter', orders);

      expect(path.kind).toBe('PRIMARY_SORT_QUERY');
      expect(keyProperties(path)).toEqual(['customerId', 'orderId']);
      expect(filterProperties(path)).toEqual(['orderDate']);
    });

    it('should use only one condition per key as key condition', () => {
      const path = resolve('findByCustomerIdAndOrderIdGreaterThanAndOrderIdLessThan', orders);

      expect(keyProperties(path)).toEqual(['customerId', 'orderId']);
      expect(path.keyConditions[1].operator).toBe('GREATER_THAN');
      expect(path.residualFilters.map((predicate) => predicate.operator)).toEqual(['LESS_THAN']);
    });

    it('should keep filter-only operators on the sort key out of the key condition', () => {
      const path = resolve('findByCustomerIdAndOrderIdStartingWith', orders);

      expect(path.kind).toBe('PRIMARY_SORT_QUERY');
      expect(keyProperties(path)).toEqual(['customerId']);
      expect(filterProperties(path)).toEqual(['orderId']);
    });

    it('should set the direction from the ordering', () => {
      expect(resolve('findByCustomerIdAndOrderIdGreaterThanOrderByOrderIdDesc', orders).scanIndexForward).toBe(false);
      expect(resolve('findByCustomerIdAndOrderIdGreaterThanOrderByOrderIdAsc', orders).scanIndexForward).toBe(true);
      expect(resolve('findByCustomerIdAndOrderIdGreaterThan', orders).scanIndexForward).toBeUndefined();
    });

    it('should reject ordering by anything but the range key', () => {
      expect(() => resolve('findByCustomerIdAndOrderIdGreaterThanOrderByTotalAsc', orders)).toThrow(
        'Sorting only possible by [orderId] for the criteria specified and not for total'
      );
    });
  });

  describe('local index query', () => {
    it('should query a local index', () => {
      const path = resolve('findByCustomerIdAndOrderDateAfter', orders);

      expect(path.kind).toBe('LOCAL_INDEX_QUERY');
      expect(path.indexName).toBe('orderDate-index');
      expect(describeAccessPath(path)).toBe('LOCAL_INDEX_QUERY(orderDate-index)');
    });

    it('should pick the first local index condition in method order', () => {
      const first = resolve('findByCustomerIdAndOrderDateAfterAndTotalLessThan', orders);
      expect(first.indexName).toBe('orderDate-index');
      expect(filterProperties(first)).toEqual(['total']);

      const second = resolve('findByCustomerIdAndTotalLessThanAndOrderDateAfter', orders);
      expect(second.indexName).toBe('total-index');
      expect(filterProperties(second)).toEqual(['orderDate']);
    });
  });

  describe('global index query', () => {
    it('should query a global index by its hash key', () => {
      const path = resolve('findByStatus', orders);

      expect(path.kind).toBe('GLOBAL_INDEX_QUERY');
      expect(path.indexName).toBe('status-index');
      expect(keyProperties(path)).toEqual(['status']);
    });

    it('should prefer an index matching hash and range key', () => {
      const path = resolve('findByStatusAndOrderDateAfter', orders);

      expect(path.indexName).toBe('status-date-index');
      expect(keyProperties(path)).toEqual(['status', 'orderDate']);
    });

    it('should prefer the index whose range key is the ordering property', () => {
      const path = resolve('findByStatusOrderByOrderDateDesc', orders);

      expect(path.indexName).toBe('status-date-index');
      expect(keyProperties(path)).toEqual(['status']);
      expect(path.scanIndexForward).toBe(false);
    });

    it('should fall back to declaration order', () => {
      const path = resolve('findByStatusAndTotalGreaterThan', orders);

      expect(path.indexName).toBe('status-index');
      expect(filterProperties(path)).toEqual(['total']);
    });

    it('should filter the partition key when a global index serves the query', () => {
      const path = resolve('findByCustomerIdAndRegion', orders);

      expect(path.kind).toBe('GLOBAL_INDEX_QUERY');
      expect(path.indexName).toBe('region-index');
      expect(filterProperties(path)).toEqual(['customerId']);
    });

    it('should reject non-equality conditions on an index hash key', () => {
      expect(() => resolve('findByStatusNot', orders)).toThrow(
        'Only equality conditions are supported on index hash key status, not NOT_EQUALS'
      );
    });

    it('should query a simple key entity through its global index', () => {
      expect(resolve('findByEmail', customers).indexName).toBe('email-index');
    });
  });

  describe('partition query', () => {
    it('should query the partition alone', () => {
      const path = resolve('findByCustomerId', orders);

      expect(path.kind).toBe('PRIMARY_SORT_QUERY');
      expect(keyProperties(path)).toEqual(['customerId']);
      expect(path.residualFilters).toEqual([]);
    });

    it('should filter within the partition', () => {
      const path = resolve('findByCustomerIdAndTagsContaining', orders);

      expect(path.kind).toBe('PRIMARY_SORT_QUERY');
      expect(filterProperties(path)).toEqual(['tags']);
    });

    it('should query a simple key partition with a filter', () => {
      const path = resolve('findByCustomerIdAndName', customers);

      expect(path.kind).toBe('PRIMARY_SORT_QUERY');
      expect(path.rangeKey).toBeUndefined();
      expect(filterProperties(path)).toEqual(['name']);
    });

    it('should order by the table sort key', () => {
      expect(resolve('findByCustomerIdOrderByOrderIdDesc', orders).scanIndexForward).toBe(false);
    });

    it('should switch to the local index of the ordering property', () => {
      const path = resolve('findByCustomerIdOrderByTotalAsc', orders);

      expect(path.kind).toBe('LOCAL_INDEX_QUERY');
      expect(path.indexName).toBe('total-index');
      expect(path.scanIndexForward).toBe(true);
    });
  });

  describe('scan', () => {
    it('should scan when no key path applies', () => {
      const path = resolve('findByTotalGreaterThanAndShippedTrue', orders, SCAN);

      expect(path.kind).toBe('SCAN');
      expect(path.keyConditions).toEqual([]);
      expect(filterProperties(path)).toEqual(['total', 'shipped']);
    });

    it('should scan on a non-equality partition key condition', () => {
      expect(resolve('findByCustomerIdGreaterThan', orders, SCAN).kind).toBe('SCAN');
    });

    it('should require scanning to be enabled', () => {
      expect(() => resolve('findByTotalGreaterThan', orders)).toThrow(ScanNotEnabledError);
    });

    it('should require scan counts to be enabled for count methods', () => {
      expect(() => resolve('countByTotalGreaterThan', orders, { enableScan: true, enableScanCount: false })).toThrow(
        ScanCountNotEnabledError
      );
      expect(resolve('countByTotalGreaterThan', orders, { enableScan: false, enableScanCount: true }).kind).toBe('SCAN');
    });

    it('should reject ordering a scan', () => {
      expect(() => resolve('findByTotalGreaterThanOrderByTotalAsc', orders, SCAN)).toThrow(
        'Sorting not possible for scan operations'
      );
    });
  });

  it('should classify every predicate exactly once', () => {
    const methods = [
      'findByCustomerIdAndOrderIdGreaterThanAndOrderIdLessThanAndShippedTrue',
      'findByStatusAndOrderDateAfterAndTotalLessThan',
      'findByCustomerIdAndTotalBetweenAndNoteIsNull',
      'findByChannelInAndTagsNotContaining',
    ];
    for (const methodName of methods) {
      const tree = bindPredicateTree(parseMethodName(methodName), orders);
      const path = resolveAccessPath(tree, orders, SCAN);
      const classified = [...path.keyConditions, ...path.residualFilters];

      expect(classified).toHaveLength(tree.predicates.length);
      expect(new Set(classified).size).toBe(tree.predicates.length);
    }
  });

  it('should resolve the same tree to the same access path every time', () => {
    const methods = [
      'findByStatusAndOrderDateAfterAndTotalLessThan',
      'findByStatusOrderByOrderDateDesc',
      'findByCustomerIdAndTotalLessThanAndOrderDateAfter',
    ];
    for (const methodName of methods) {
      const tree = bindPredicateTree(parseMethodName(methodName), orders);
      const first = resolveAccessPath(tree, orders, SCAN);
      const second = resolveAccessPath(tree, orders, SCAN);

      expect(second).toEqual(first);
    }
    expect(resolve('findByStatusAndOrderDateAfterAndTotalLessThan', orders).indexName).toBe('status-date-index');
  });
});
