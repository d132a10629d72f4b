/**
 * DynamoDB Scan Operation
 *
 * Full-table scans, one page per call, and their COUNT form.
 */

import { DynamoDBDocumentClient, ScanCommand } from '@aws-sdk/lib-dynamodb';
import type { ScanCommandInput } from '@aws-sdk/lib-dynamodb';
import type { AttributeValue } from '../types/key.js';
import type { ScanRequest } from '../types/request.js';
import type { Page } from '../types/results.js';
import { toConsistentRead } from '../types/request.js';
import { nonEmpty, toConsumedCapacity } from './capacity.js';
import { withoutProjection } from './query.js';

function toScanInput(tableName: string, request: ScanRequest): ScanCommandInput {
  return {
    TableName: tableName,
    FilterExpression: request.filterExpression,
    ProjectionExpression: request.projectionExpression,
    ExpressionAttributeNames: nonEmpty(request.expressionAttributeNames),
    ExpressionAttributeValues: nonEmpty(request.expressionAttributeValues),
    ConsistentRead: toConsistentRead(request.consistency),
    Limit: request.limit,
  };
}

/**
 * Fetches one page of a scan.
 *
 * Scans read every item in the table and are much more expensive than
 * queries; the filter only reduces what is returned, not what is read.
 *
 * @param exclusiveStartKey - `lastEvaluatedKey` of the previous page
 */
export async function scanPage(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  request: ScanRequest,
  exclusiveStartKey?: Record<string, AttributeValue>
): Promise<Page> {
  const command = new ScanCommand({
    ...toScanInput(tableName, request),
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
 * Counts the items matching a scan filter with `Select: 'COUNT'`.
 */
export async function countScan(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  request: ScanRequest
): Promise<number> {
  const input: ScanCommandInput = {
    ...toScanInput(tableName, request),
    ProjectionExpression: undefined,
    Select: 'COUNT',
  };
  if (request.projectionExpression !== undefined) {
    input.ExpressionAttributeNames = nonEmpty(withoutProjection(request.expressionAttributeNames));
  }

  let total = 0;
  let exclusiveStartKey: Record<string, AttributeValue> | undefined;
  do {
    const response = await docClient.send(new ScanCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }));
    total += response.Count ?? 0;
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return total;
}
