/**
 * Middleware Module
 */

export * from './error-handler.js';
