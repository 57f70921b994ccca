/**
 * Application Layer
 *
 * Use cases for administrator credentials.
 */

export type { CredentialUseCase } from './use-case.js';
export * from './principal/index.js';
