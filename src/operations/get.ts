/**
 * DynamoDB GetItem Operation
 *
 * Single-item retrieval by primary key.
 */

import { DynamoDBDocumentClient, GetCommand } from '@aws-sdk/lib-dynamodb';
import type { AttributeValue } from '../types/key.js';
import type { Item } from '../types/item.js';

/**
 * Retrieves a single item by its primary key.
 *
 * @param keyMap - Key attributes by wire name
 * @param consistentRead - Unset leaves the service default
 * @returns The stored item, or undefined if there is none
 *
 * @example
 * ```typescript
 * const item = await getItem(docClient, 'Orders', { customerId: 'c-1', orderId: 'o-7' });
 * ```
 */
export async function getItem(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keyMap: Record<string, AttributeValue>,
  consistentRead?: boolean
): Promise<Item | undefined> {
  const command = new GetCommand({
    TableName: tableName,
    Key: keyMap,
    ConsistentRead: consistentRead,
  });

  const response = await docClient.send(command);
  return response.Item;
}
