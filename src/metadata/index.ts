/**
 * Entity Key Metadata
 *
 * Schema declarations, validation and the immutable key metadata consumed by
 * the access-path resolver.
 */

export type { EntitySchema, AttributeDeclaration, CompositeIdDeclaration } from './schema.js';
export type {
  EntityKeyMetadata,
  SimpleKeyMetadata,
  CompositeKeyMetadata,
  CompositeIdMetadata,
  GlobalIndexKeys,
  DefineEntityOptions,
} from './entity.js';
export { defineEntity, attributeNameOf, sortKeyOf } from './entity.js';
export { validateEntitySchema } from './validation.js';
