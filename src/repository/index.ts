export type { MethodDeclarations, RepositoryOptions } from './repository.js';
export { Repository, createRepository } from './repository.js';
