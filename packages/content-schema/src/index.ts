export { ContentSchemaError, formatIssues } from './errors.js';

export * from './base/ids.js';
export * from './base/numbers.js';
export * from './base/curves.js';
export * from './base/curves.arbitraries.js';
export * from './base/costs.js';

export * from './modules/resources.js';
export * from './modules/generators.js';
export * from './modules/upgrades.js';
export * from './modules/blueprints.js';

export {
  createCost,
  createGenerator,
  createResource,
  createUpgrade,
} from './factories.js';

