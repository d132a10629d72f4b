/**
 * Expression and request builders.
 */

export type { PlaceholderPrefixes } from './condition.js';
export {
  ConditionBuilder,
  KEY_PLACEHOLDERS,
  FILTER_PLACEHOLDERS,
  PROJECTION_PLACEHOLDERS,
  emptyExpressionAttributes,
} from './condition.js';

export { isAttributeValue, isRecord, requireValue } from './arguments.js';

export type { RequestOptions, BuildContext } from './request.js';
export { buildLoadRequest, buildQueryRequest, buildScanRequest } from './request.js';
