/**
 * Default configuration values.
 * @module config/defaults
 */

/**
 * Default AWS region.
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Endpoint used when DYNAMODB_LOCAL is set.
 */
export const DEFAULT_LOCAL_ENDPOINT = 'http://localhost:8000';

/**
 * Maximum number of delete requests in a single BatchWriteItem call.
 */
export const MAX_BATCH_WRITE_ITEMS = 25;
