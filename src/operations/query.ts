/**
 * DynamoDB Query Operation
 *
 * Page-at-a-time queries against a table or one of its indexes, and the
 * COUNT form used by count methods.
 */

import { DynamoDBDocumentClient, QueryCommand } from '@aws-sdk/lib-dynamodb';
import type { QueryCommandInput } from '@aws-sdk/lib-dynamodb';
import type { AttributeValue } from '../types/key.js';
import type { QueryRequest } from '../types/request.js';
import type { Page } from '../types/results.js';
import { toConsistentRead } from '../types/request.js';
import { nonEmpty, toConsumedCapacity } from './capacity.js';

function toQueryInput(tableName: string, request: QueryRequest): QueryCommandInput {
  return {
    TableName: tableName,
    IndexName: request.indexName,
    KeyConditionExpression: request.keyConditionExpression,
    FilterExpression: request.filterExpression,
    ProjectionExpression: request.projectionExpression,
    ExpressionAttributeNames: nonEmpty(request.expressionAttributeNames),
    ExpressionAttributeValues: nonEmpty(request.expressionAttributeValues),
    ConsistentRead: toConsistentRead(request.consistency),
    ScanIndexForward: request.scanIndexForward,
    Limit: request.limit,
  };
}

/**
 * Fetches one page of a query.
 *
 * @param exclusiveStartKey - `lastEvaluatedKey` of the previous page
 *
 * @example
 * ```typescript
 * const page = await queryPage(docClient, 'Orders', {
 *   keyConditionExpression: '#k0 = :k0',
 *   expressionAttributeNames: { '#k0': 'customerId' },
 *   expressionAttributeValues: { ':k0': 'c-1' },
 *   consistency: 'DEFAULT',
 * });
 * ```
 */
export async function queryPage(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  request: QueryRequest,
  exclusiveStartKey?: Record<string, AttributeValue>
): Promise<Page> {
  const command = new QueryCommand({
    ...toQueryInput(tableName, request),
    ExclusiveStartKey: exclusiveStartKey,
    ReturnConsumedCapacity: 'TOTAL',
  });

  const response = await docClient.send(command);

  return {
    items: response.Items ?? [],
    lastEvaluatedKey: response.LastEvaluatedKey,
    count: response.Count ?? 0,
    scannedCount: response.ScannedCount ?? 0,
    consumedCapacity: toConsumedCapacity(response.ConsumedCapacity),
  };
}

/**
 * Counts the items matching a query with `Select: 'COUNT'`, following
 * `LastEvaluatedKey` until the result set is exhausted.
 */
export async function countQuery(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  request: QueryRequest
): Promise<number> {
  const input: QueryCommandInput = {
    ...toQueryInput(tableName, request),
    ProjectionExpression: undefined,
    Select: 'COUNT',
  };
  if (request.projectionExpression !== undefined) {
    input.ExpressionAttributeNames = nonEmpty(withoutProjection(request.expressionAttributeNames));
  }

  let total = 0;
  let exclusiveStartKey: Record<string, AttributeValue> | undefined;
  do {
    const response = await docClient.send(new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }));
    total += response.Count ?? 0;
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return total;
}

/**
 * Removes projection placeholders, which a COUNT request must not carry.
 */
export function withoutProjection(names: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(names).filter(([placeholder]) => !placeholder.startsWith('#p')));
}
