/**
 * DynamoDB BatchWriteItem deletes.
 *
 * Deletes are sent in chunks of 25, the BatchWriteItem limit. Requests the
 * service hands back as unprocessed are not retried; they are reported
 * through BatchDeleteError once every chunk has been sent.
 */

import { DynamoDBDocumentClient, BatchWriteCommand } from '@aws-sdk/lib-dynamodb';
import type { AttributeValue } from '../types/key.js';
import type { BatchDeleteResult } from '../types/results.js';
import { MAX_BATCH_WRITE_ITEMS } from '../config/defaults.js';
import { BatchDeleteError } from '../error/index.js';
import { chunk } from './chunker.js';

/**
 * Deletes every key, one BatchWriteItem call per chunk.
 *
 * @param keyMaps - Key attributes by wire name
 * @throws {BatchDeleteError} If any delete request was left unprocessed
 *
 * @example
 * ```typescript
 * await batchDelete(docClient, 'Orders', [
 *   { customerId: 'c-1', orderId: 'o-1' },
 *   { customerId: 'c-1', orderId: 'o-2' },
 * ]);
 * ```
 */
export async function batchDelete(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keyMaps: readonly Record<string, AttributeValue>[]
): Promise<BatchDeleteResult> {
  let processedCount = 0;
  let unprocessedCount = 0;
  let batches = 0;

  for (const keyChunk of chunk(keyMaps, MAX_BATCH_WRITE_ITEMS)) {
    const command = new BatchWriteCommand({
      RequestItems: {
        [tableName]: keyChunk.map((keyMap) => ({ DeleteRequest: { Key: keyMap } })),
      },
    });

    const response = await docClient.send(command);
    batches++;

    const unprocessed = response.UnprocessedItems?.[tableName]?.length ?? 0;
    unprocessedCount += unprocessed;
    processedCount += keyChunk.length - unprocessed;
  }

  if (unprocessedCount > 0) {
    throw new BatchDeleteError(tableName, unprocessedCount);
  }

  return { processedCount, batches };
}
