/**
 * Persistence Layer
 *
 * Admin principal tables and repositories. The audit log lives in
 * @gatehouse/persistence.
 */

export * from './schema/index.js';
export * from './repositories/index.js';
