/**
 * Request Builder Tests
 */

import { describe, it, expect } from 'vitest';
import { buildLoadRequest, buildQueryRequest, buildScanRequest } from '../request.js';
import type { RequestOptions } from '../request.js';
import { parseMethodName } from '../../parser/method-name.js';
import { bindPredicateTree } from '../../parser/binding.js';
import { resolveAccessPath } from '../../resolver/resolver.js';
import type { ResolvedAccessPath } from '../../resolver/access-path.js';
import { defineEntity } from '../../metadata/entity.js';
import type { EntityKeyMetadata } from '../../metadata/entity.js';
import { ConfigurationError, ParameterBindingError } from '../../error/index.js';
import { customerSchema, orderSchema, playlistSchema } from '../../__tests__/fixtures.js';

const customers = defineEntity(customerSchema);
const orders = defineEntity(orderSchema);
const playlists = defineEntity(playlistSchema);

function resolve(methodName: string, metadata: EntityKeyMetadata): ResolvedAccessPath {
  return resolveAccessPath(bindPredicateTree(parseMethodName(methodName), metadata), metadata, {
    enableScan: true,
    enableScanCount: true,
  });
}

function query(methodName: string, args: unknown[], options?: RequestOptions, metadata = orders) {
  return buildQueryRequest(resolve(methodName, metadata), args, { metadata, methodName, options });
}

function scan(methodName: string, args: unknown[], options?: RequestOptions) {
  return buildScanRequest(resolve(methodName, orders), args, { metadata: orders, methodName, options });
}

function load(methodName: string, args: unknown[], metadata: EntityKeyMetadata, options?: RequestOptions) {
  return buildLoadRequest(resolve(methodName, metadata), args, { metadata, methodName, options });
}

describe('buildQueryRequest', () => {
  it('should render key conditions with key placeholders', () => {
    const request = query('findByCustomerIdAndOrderIdBetween', ['c-1', 'o-1', 'o-9']);

    expect(request.keyConditionExpression).toBe('#k0 = :k0 AND #k1 BETWEEN :k1 AND :k2');
    expect(request.expressionAttributeNames).toEqual({ '#k0': 'customerId', '#k1': 'orderId' });
    expect(request.expressionAttributeValues).toEqual({ ':k0': 'c-1', ':k1': 'o-1', ':k2': 'o-9' });
    expect(request.indexName).toBeUndefined();
    expect(request.filterExpression).toBeUndefined();
    expect(request.projectionExpression).toBeUndefined();
    expect(request.consistency).toBe('DEFAULT');
    expect(request.limit).toBeUndefined();
  });

  it('should use stored attribute names', () => {
    const request = query('findByStatus', ['OPEN']);

    expect(request.indexName).toBe('status-index');
    expect(request.keyConditionExpression).toBe('#k0 = :k0');
    expect(request.expressionAttributeNames).toEqual({ '#k0': 'order_status' });
    expect(request.expressionAttributeValues).toEqual({ ':k0': 'OPEN' });
  });

  it('should carry the direction of the ordering', () => {
    expect(query('findByStatusOrderByOrderDateDesc', ['OPEN']).scanIndexForward).toBe(false);
  });

  it('should combine derived filters, the static filter, projection and options', () => {
    const request = query('findByCustomerIdAndTotalGreaterThanAndShipped', ['c-1', 100, true], {
      filterExpression: '#ch = :ch',
      expressionAttributeNames: { '#ch': 'channel' },
      expressionAttributeValues: { ':ch': 'web' },
      projection: ['orderId', 'status'],
      consistency: 'CONSISTENT',
      limit: 20,
    });

    expect(request).toEqual({
      indexName: 'total-index',
      keyConditionExpression: '#k0 = :k0 AND #k1 > :k1',
      filterExpression: '#n0 = :v0 AND (#ch = :ch)',
      projectionExpression: '#p0, #p1',
      consistency: 'CONSISTENT',
      scanIndexForward: undefined,
      limit: 20,
      expressionAttributeNames: {
        '#k0': 'customerId',
        '#k1': 'total',
        '#n0': 'shipped',
        '#ch': 'channel',
        '#p0': 'orderId',
        '#p1': 'order_status',
      },
      expressionAttributeValues: { ':k0': 'c-1', ':k1': 100, ':v0': true, ':ch': 'web' },
    });
  });

  it('should use the static filter alone when nothing else filters', () => {
    const request = query('findByCustomerId', ['c-1'], {
      filterExpression: 'attribute_exists(#ch)',
      expressionAttributeNames: { '#ch': 'channel' },
    });

    expect(request.filterExpression).toBe('attribute_exists(#ch)');
    expect(request.expressionAttributeNames).toEqual({ '#k0': 'customerId', '#ch': 'channel' });
  });

  it('should reject static placeholders that collide with derived ones', () => {
    expect(() =>
      query('findByCustomerIdAndShipped', ['c-1', true], {
        filterExpression: '#n0 = :w',
        expressionAttributeNames: { '#n0': 'channel' },
        expressionAttributeValues: { ':w': 'web' },
      })
    ).toThrow(
      new ConfigurationError(
        'Placeholder #n0 of the filter expression of findByCustomerIdAndShipped collides with a derived placeholder'
      )
    );
  });

  it('should query a simple key partition with a filter', () => {
    const request = query('findByCustomerIdAndName', ['c-1', 'Ada'], undefined, customers);

    expect(request.keyConditionExpression).toBe('#k0 = :k0');
    expect(request.filterExpression).toBe('#n0 = :v0');
    expect(request.expressionAttributeNames).toEqual({ '#k0': 'customerId', '#n0': 'name' });
  });
});

describe('buildScanRequest', () => {
  it('should render comparison and collection filters', () => {
    const request = scan('findByTotalNotAndChannelIn', [5, ['web', 'store']]);

    expect(request.filterExpression).toBe('#n0 <> :v0 AND #n1 IN (:v1, :v2)');
    expect(request.expressionAttributeNames).toEqual({ '#n0': 'total', '#n1': 'channel' });
    expect(request.expressionAttributeValues).toEqual({ ':v0': 5, ':v1': 'web', ':v2': 'store' });
  });

  it('should accept a set for IN', () => {
    const request = scan('findByChannelIn', [new Set(['web'])]);

    expect(request.filterExpression).toBe('#n0 IN (:v0)');
    expect(request.expressionAttributeValues).toEqual({ ':v0': 'web' });
  });

  it('should render zero-argument operators', () => {
    const request = scan('findByNoteIsNullAndShippedTrueAndTagsNotContaining', ['gift']);

    expect(request.filterExpression).toBe('attribute_not_exists(#n0) AND #n1 = :v0 AND NOT contains(#n2, :v1)');
    expect(request.expressionAttributeNames).toEqual({ '#n0': 'note', '#n1': 'shipped', '#n2': 'tags' });
    expect(request.expressionAttributeValues).toEqual({ ':v0': true, ':v1': 'gift' });
  });

  it('should render function conditions', () => {
    const request = scan('findByNoteIsNotNullAndChannelStartingWithAndTagsContaining', ['we', ['vip']]);

    expect(request.filterExpression).toBe('attribute_exists(#n0) AND begins_with(#n1, :v0) AND contains(#n2, :v1)');
    expect(request.expressionAttributeValues).toEqual({ ':v0': 'we', ':v1': 'vip' });
  });

  it('should render inclusive bounds and false', () => {
    const request = scan('findByTotalGreaterThanEqualAndTotalLessThanEqualAndShippedFalse', [1, 9]);

    expect(request.filterExpression).toBe('#n0 >= :v0 AND #n1 <= :v1 AND #n2 = :v2');
    expect(request.expressionAttributeNames).toEqual({ '#n0': 'total', '#n1': 'total', '#n2': 'shipped' });
    expect(request.expressionAttributeValues).toEqual({ ':v0': 1, ':v1': 9, ':v2': false });
  });

  it('should scan without a filter when the method has no criteria', () => {
    expect(scan('findAll', [])).toEqual({
      filterExpression: undefined,
      projectionExpression: undefined,
      consistency: 'DEFAULT',
      limit: undefined,
      expressionAttributeNames: {},
      expressionAttributeValues: {},
    });
  });

  describe('argument binding', () => {
    it('should reject null arguments', () => {
      expect(() => scan('findByTotalGreaterThan', [null])).toThrow(ParameterBindingError);
      expect(() => scan('findByTotalGreaterThan', [null])).toThrow('Creating conditions on null parameters not supported');
      expect(() => scan('findByChannelIn', [undefined])).toThrow('Creating conditions on null parameters not supported');
    });

    it('should reject an empty IN collection', () => {
      expect(() => scan('findByChannelIn', [[]])).toThrow('IN on property channel requires a non-empty collection');
      expect(() => scan('findByChannelIn', ['web'])).toThrow('IN on property channel requires a non-empty collection');
    });

    it('should reject several values for CONTAINING', () => {
      expect(() => scan('findByTagsContaining', [['a', 'b']])).toThrow(
        'Only a single value or a one-element collection can be used with CONTAINING on property tags'
      );
    });

    it('should reject values the store cannot hold', () => {
      expect(() => scan('findByNote', [new Date(0)])).toThrow('Argument for property note is not a storable value');
    });
  });
});

describe('buildLoadRequest', () => {
  it('should bind the partition key of a simple entity', () => {
    expect(load('findByCustomerId', ['c-1'], customers, { consistency: 'CONSISTENT' })).toEqual({
      key: { partitionKey: 'c-1', sortKey: undefined },
      consistency: 'CONSISTENT',
    });
  });

  it('should bind both keys whatever their order in the name', () => {
    expect(load('findByOrderIdAndCustomerId', ['o-7', 'c-1'], orders).key).toEqual({
      partitionKey: 'c-1',
      sortKey: 'o-7',
    });
  });

  it('should bind the composite id object', () => {
    expect(load('findByPlaylistId', [{ userName: 'ann', playlistName: 'road' }], playlists)).toEqual({
      key: { partitionKey: 'ann', sortKey: 'road' },
      consistency: 'DEFAULT',
    });
  });

  it('should reject a composite id that is not an object', () => {
    expect(() => load('findByPlaylistId', ['ann'], playlists)).toThrow(
      'Argument for playlistId must be an object holding userName and playlistName'
    );
  });

  it('should reject a composite id with a missing key value', () => {
    expect(() => load('findByPlaylistId', [{ userName: 'ann' }], playlists)).toThrow(
      'Creating conditions on null parameters not supported'
    );
  });
});
