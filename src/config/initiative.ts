export type InitiativeConfig = {
  /** Starting pool capacity. */
  capacity: number;
  /** Hard limit `increaseCapacity` may never cross. */
  capacityCeiling: number;
  startingAmount: number;
  /** Units per second before dynamic modifiers. */
  baseRegenerationRate: number;
  /** Seconds a reaction window stays open. */
  reactionWindowDuration: number;
  /** Longest projected wait (seconds) an enqueue may commit to. */
  enqueueHorizon: number;
  momentumCap: number;
  momentumStackLimit: number;
  resonanceTolerance: number;
  favorBound: number;
};

type ConfigKey = keyof InitiativeConfig;

export const DEFAULT_INITIATIVE_CONFIG: Readonly<InitiativeConfig> = {
  capacity: 6,
  capacityCeiling: 8,
  startingAmount: 0,
  baseRegenerationRate: 0.5,
  reactionWindowDuration: 1.5,
  enqueueHorizon: 10,
  momentumCap: 3,
  momentumStackLimit: 5,
  resonanceTolerance: 1,
  favorBound: 10,
};

export const REGENERATION_MODIFIERS = {
  health: [
    { below: 0.3, multiplier: 1.5 },
    { below: 0.6, multiplier: 1.2 },
  ],
  nearCapacity: { withinUnits: 1, multiplier: 0.5 },
  blessing: 1.25,
  favor: {
    highAbove: 5,
    highMultiplier: 1.3,
    lowBelow: -5,
    lowMultiplier: 0.7,
  },
} as const;

const INTEGER_KEYS = new Set<ConfigKey>([
  "capacity",
  "capacityCeiling",
  "startingAmount",
  "momentumCap",
  "momentumStackLimit",
  "resonanceTolerance",
  "favorBound",
]);

const POSITIVE_KEYS = new Set<ConfigKey>(["capacity", "capacityCeiling"]);

const CONFIG_KEYS = Object.keys(DEFAULT_INITIATIVE_CONFIG) as ConfigKey[];

const isConfigKey = (value: string): value is ConfigKey =>
  CONFIG_KEYS.some((key) => key === value);

export const validateConfigValue = (key: ConfigKey, value: number): number => {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid initiative config "${key}": ${value}`);
  }
  if (INTEGER_KEYS.has(key) && !Number.isInteger(value)) {
    throw new Error(`Initiative config "${key}" must be an integer, got ${value}`);
  }
  if (POSITIVE_KEYS.has(key) && value === 0) {
    throw new Error(`Initiative config "${key}" must be positive`);
  }
  return value;
};

export const resolveInitiativeConfig = (
  overrides: Partial<InitiativeConfig> = {}
): InitiativeConfig => {
  const resolved: InitiativeConfig = { ...DEFAULT_INITIATIVE_CONFIG };
  CONFIG_KEYS.forEach((key) => {
    const value = overrides[key];
    if (value === undefined) return;
    resolved[key] = validateConfigValue(key, value);
  });

  if (resolved.capacity > resolved.capacityCeiling) {
    throw new Error(
      `Initiative capacity ${resolved.capacity} exceeds ceiling ${resolved.capacityCeiling}`
    );
  }
  resolved.startingAmount = Math.min(resolved.startingAmount, resolved.capacity);
  return resolved;
};

/**
 * Reads a partial config from parsed JSON. Unknown keys are reported and
 * skipped; known keys must hold numbers.
 */
export const parseInitiativeConfig = (
  raw: unknown,
  onUnknownKey: (key: string) => void = (key) =>
    console.warn(`Unknown initiative config key: ${key}`)
): Partial<InitiativeConfig> => {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("Initiative config must be a JSON object.");
  }
  const parsed: Partial<InitiativeConfig> = {};
  Object.entries(raw).forEach(([key, value]) => {
    if (!isConfigKey(key)) {
      onUnknownKey(key);
      return;
    }
    if (typeof value !== "number") {
      throw new Error(`Initiative config "${key}" must be a number.`);
    }
    parsed[key] = value;
  });
  return parsed;
};
