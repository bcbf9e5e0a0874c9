// Core types and enums for the warranty registration ledger
export * from './enums.js';
export * from './serials.js';
export * from './products.js';
export * from './audit.js';
export * from './api.js';
