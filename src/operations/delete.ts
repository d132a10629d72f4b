/**
 * DynamoDB DeleteItem Operation
 */

import { DynamoDBDocumentClient, DeleteCommand } from '@aws-sdk/lib-dynamodb';
import type { AttributeValue } from '../types/key.js';
import type { Item } from '../types/item.js';

/**
 * Deletes an item by its primary key.
 *
 * @returns The removed item, or undefined if nothing was stored under the key
 */
export async function deleteItem(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keyMap: Record<string, AttributeValue>
): Promise<Item | undefined> {
  const response = await docClient.send(
    new DeleteCommand({
      TableName: tableName,
      Key: keyMap,
      ReturnValues: 'ALL_OLD',
    })
  );
  return response.Attributes;
}
