/**
 * DynamoDB PutItem Operation
 */

import { DynamoDBDocumentClient, PutCommand } from '@aws-sdk/lib-dynamodb';
import type { Item } from '../types/item.js';

/**
 * Creates or replaces an item. The item is keyed by wire attribute names.
 */
export async function putItem(docClient: DynamoDBDocumentClient, tableName: string, item: Item): Promise<void> {
  await docClient.send(
    new PutCommand({
      TableName: tableName,
      Item: item,
    })
  );
}
