/**
 * Providers Module Exports
 * @module providers
 */

export * from './types';
export * from './function-registry';
export * from './provider-registry';
export * from './handler-utils';
export { awsCustomHandlers, awsNameGenerators, availabilityZoneInstance } from './aws/handlers';
export { gcpCustomHandlers, gcpNameGenerators, regionOfZone } from './gcp/handlers';
export { azureCustomHandlers } from './azure/handlers';
