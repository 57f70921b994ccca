export * from './create-principal/index.js';
export * from './change-password/index.js';
