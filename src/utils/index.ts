/**
 * Utilities Module
 * @module utils
 *
 * Node identifier and attribute value helpers.
 */

export * from './node-id';
export * from './attributes';
