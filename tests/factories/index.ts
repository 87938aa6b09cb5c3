/**
 * Test Factories Index
 * @module tests/factories
 *
 * Central export for all test factory functions.
 */

export * from './terraform.factory';
export * from './graph.factory';
export * from './provider.factory';
