/**
 * Storage exports
 */

export type {
  StorageProvider,
  CatalogStore,
  PreferenceWrite,
} from './storage-provider.js';

export { SqliteStorageProvider } from './sqlite-provider.js';
export type { SqliteStorageConfig } from './sqlite-provider.js';

export { SqliteCatalogStore } from './sqlite-catalog.js';
export type { SqliteCatalogConfig } from './sqlite-catalog.js';

export { seedCatalog, loadSeedFile } from './catalog-seed.js';
