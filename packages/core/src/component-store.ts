/**
 * Mutable per-entity state owned by a single simulation. Blueprints describe
 * what exists; components hold how much of it there currently is.
 */

/** Live amount of one resource, keyed by the resource's identifier. */
export interface ResourceComponent {
  value: number;
}

/** Current level of one upgradable, keyed by the upgradable's identifier. */
export interface UpgradeComponent {
  level: number;
}

export interface SerializedResourceComponent {
  readonly id: string;
  readonly value: number;
}

export interface SerializedUpgradeComponent {
  readonly id: string;
  readonly level: number;
}

export interface SerializedComponentStore {
  readonly resources: readonly SerializedResourceComponent[];
  readonly upgrades: readonly SerializedUpgradeComponent[];
}

export interface ComponentStore {
  /**
   * Creates (or replaces) the resource component for `id`. Returns whether a
   * component already existed.
   */
  putResource(id: string, value?: number): boolean;
  /**
   * Creates (or replaces) the upgrade component for `id`. Returns whether a
   * component already existed.
   */
  putUpgrade(id: string, level?: number): boolean;
  getResource(id: string): ResourceComponent | undefined;
  getUpgrade(id: string): UpgradeComponent | undefined;
  hasResource(id: string): boolean;
  hasUpgrade(id: string): boolean;
  readonly resourceCount: number;
  readonly upgradeCount: number;
  exportForSave(): SerializedComponentStore;
}

export function createComponentStore(): ComponentStore {
  const resources = new Map<string, ResourceComponent>();
  const upgrades = new Map<string, UpgradeComponent>();

  return {
    putResource(id, value = 0) {
      const existed = resources.has(id);
      resources.set(id, { value });
      return existed;
    },
    putUpgrade(id, level = 0) {
      const existed = upgrades.has(id);
      upgrades.set(id, { level: sanitizeLevel(level) });
      return existed;
    },
    getResource: (id) => resources.get(id),
    getUpgrade: (id) => upgrades.get(id),
    hasResource: (id) => resources.has(id),
    hasUpgrade: (id) => upgrades.has(id),
    get resourceCount() {
      return resources.size;
    },
    get upgradeCount() {
      return upgrades.size;
    },
    exportForSave() {
      return {
        resources: [...resources.entries()]
          .sort(([left], [right]) => left.localeCompare(right))
          .map(([id, component]) => ({ id, value: component.value })),
        upgrades: [...upgrades.entries()]
          .sort(([left], [right]) => left.localeCompare(right))
          .map(([id, component]) => ({ id, level: component.level })),
      };
    },
  };
}

function sanitizeLevel(level: number): number {
  if (!Number.isFinite(level) || level <= 0) {
    return 0;
  }
  return Math.floor(level);
}
