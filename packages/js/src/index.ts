/**
 * @ldsync/core: tabular edits to linked-data updates
 *
 * Diffs edited spreadsheet rows against the graphs of repository
 * resources and applies the net change as one SPARQL Update per row.
 */

// Client
export { LdSyncClient } from './client.js';
export type { LdSyncClientOptions, ClientImportOptions, RowPreview } from './client.js';

// Types
export * from './types.js';
export * from './errors.js';
export * from './namespaces.js';

// Components
export * from './terms.js';
export * from './models.js';
export * from './registry.js';
export * from './resource.js';
export * from './index-builder.js';
export * from './delta.js';
export * from './diff.js';
export * from './sparql.js';
export * from './table.js';
export * from './import.js';

// Repositories
export * from './repository.js';
export * from './memory-repository.js';
export * from './http-repository.js';

// Ambient
export * from './config.js';
export * from './logger.js';
export * from './schemas.js';
