import type { GeneratorDescription } from './generators.js';
import type { ResourceDescription } from './resources.js';
import type { UpgradeDescription } from './upgrades.js';

/** Any blueprint the simulation accepts at registration time. */
export type Blueprint =
  | ResourceDescription
  | GeneratorDescription
  | UpgradeDescription;

export type BlueprintKind = Blueprint['kind'];
