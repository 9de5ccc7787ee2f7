import {
  DEFAULT_INITIATIVE_CONFIG,
  REGENERATION_MODIFIERS,
  validateConfigValue,
  type InitiativeConfig,
} from "../../config/initiative";
import {
  TIME_EPSILON,
  type Alignment,
  type ResonanceLevel,
  type ResourceGauge,
} from "./types";

const POOL_SETTING_KEYS = [
  "capacity",
  "capacityCeiling",
  "startingAmount",
  "momentumCap",
  "momentumStackLimit",
  "resonanceTolerance",
  "favorBound",
] as const;

export type ResourceTimerOptions = Partial<
  Pick<InitiativeConfig, (typeof POOL_SETTING_KEYS)[number]> & { regenerationRate: number }
>;

export type ResourceTimer = ReturnType<typeof createResourceTimer>;

const isWholeCost = (cost: number) => Number.isInteger(cost) && cost >= 0;

const clamp = (value: number, min: number, max: number) =>
  Math.max(min, Math.min(max, value));

const validateOptions = (options: ResourceTimerOptions) => {
  POOL_SETTING_KEYS.forEach((key) => {
    const value = options[key];
    if (value !== undefined) validateConfigValue(key, value);
  });
  const rate = options.regenerationRate;
  if (rate !== undefined && (!Number.isFinite(rate) || rate < 0)) {
    throw new Error(`Invalid pool regeneration rate: ${rate}`);
  }
};

/**
 * Per-actor regenerating pool ("hourglass").
 *
 * Regeneration accumulates fractional progress and only whole units land in
 * `currentAmount`; the remainder carries over to the next call so the
 * long-run rate does not depend on how the caller slices time.
 */
export function createResourceTimer(options: ResourceTimerOptions = {}) {
  validateOptions(options);

  const capacityCeiling =
    options.capacityCeiling ?? DEFAULT_INITIATIVE_CONFIG.capacityCeiling;
  const momentumCap = options.momentumCap ?? DEFAULT_INITIATIVE_CONFIG.momentumCap;
  const momentumStackLimit =
    options.momentumStackLimit ?? DEFAULT_INITIATIVE_CONFIG.momentumStackLimit;
  const resonanceTolerance =
    options.resonanceTolerance ?? DEFAULT_INITIATIVE_CONFIG.resonanceTolerance;
  const favorBound = options.favorBound ?? DEFAULT_INITIATIVE_CONFIG.favorBound;
  const baseRegenerationRate =
    options.regenerationRate ?? DEFAULT_INITIATIVE_CONFIG.baseRegenerationRate;

  let capacity = Math.min(
    options.capacity ?? DEFAULT_INITIATIVE_CONFIG.capacity,
    capacityCeiling
  );
  let currentAmount = clamp(
    Math.floor(options.startingAmount ?? DEFAULT_INITIATIVE_CONFIG.startingAmount),
    0,
    capacity
  );
  let regenerationRate = baseRegenerationRate;
  let fractionalProgress = 0;
  let momentumStacks = 0;
  let previousCost: number | null = null;
  let favorScore = 0;
  let paused = false;

  const canAfford = (cost: number) => currentAmount >= cost;

  const spend = (cost: number): boolean => {
    if (!isWholeCost(cost) || cost > capacity || !canAfford(cost)) {
      return false;
    }
    currentAmount -= cost;
    return true;
  };

  const setAmount = (value: number) => {
    if (Number.isNaN(value)) return;
    currentAmount = clamp(Math.floor(value), 0, capacity);
  };

  const regenerate = (deltaTime: number) => {
    if (paused || !(deltaTime > 0) || !(regenerationRate > 0)) return;
    if (currentAmount >= capacity) return;

    fractionalProgress += regenerationRate * deltaTime;
    const units = Math.floor(fractionalProgress + TIME_EPSILON);
    if (units <= 0) return;

    fractionalProgress = Math.max(0, fractionalProgress - units);
    currentAmount = Math.min(capacity, currentAmount + units);
  };

  const increaseCapacity = (
    amount: number,
    { grant = true }: { grant?: boolean } = {}
  ): boolean => {
    if (!Number.isInteger(amount) || amount <= 0) return false;
    const next = capacity + amount;
    if (next > capacityCeiling) return false;
    capacity = next;
    if (grant) {
      currentAmount = Math.min(capacity, currentAmount + amount);
    }
    return true;
  };

  const timeUntilNextUnit = () => {
    if (paused || currentAmount >= capacity || !(regenerationRate > 0)) {
      return Infinity;
    }
    return Math.max(0, (1 - fractionalProgress) / regenerationRate);
  };

  const updateMomentum = (lastCost: number) => {
    if (previousCost !== null && lastCost < previousCost) {
      momentumStacks = Math.min(momentumStacks + 1, momentumStackLimit);
    } else {
      momentumStacks = 0;
    }
    previousCost = lastCost;
  };

  const momentumReduction = () => Math.min(momentumStacks, momentumCap);

  const checkResonance = (cost: number) =>
    Math.abs(cost - currentAmount) <= resonanceTolerance;

  const resonanceLevel = (cost: number): ResonanceLevel => {
    if (cost === currentAmount) return "perfect";
    return checkResonance(cost) ? "minor" : "none";
  };

  const applyAlignment = (alignment: Alignment) => {
    switch (alignment) {
      case "order":
        favorScore = Math.min(favorScore + 1, favorBound);
        break;
      case "chaos":
        favorScore = Math.max(favorScore - 1, -favorBound);
        break;
      case "balance":
        break;
    }
  };

  const dynamicRegenerationRate = (
    healthRatio: number,
    hasBlessing: boolean
  ): number => {
    const { health, nearCapacity, blessing, favor } = REGENERATION_MODIFIERS;
    let rate = baseRegenerationRate;

    const healthStep = health.find((step) => healthRatio < step.below);
    if (healthStep) {
      rate *= healthStep.multiplier;
    }
    if (currentAmount >= capacity - nearCapacity.withinUnits) {
      rate *= nearCapacity.multiplier;
    }
    if (hasBlessing) {
      rate *= blessing;
    }
    if (favorScore > favor.highAbove) {
      rate *= favor.highMultiplier;
    } else if (favorScore < favor.lowBelow) {
      rate *= favor.lowMultiplier;
    }
    return rate;
  };

  const setRegenerationRate = (rate: number) => {
    if (!Number.isFinite(rate) || rate < 0) return;
    regenerationRate = rate;
  };

  const snapshot = (): ResourceGauge => ({
    currentAmount,
    capacity,
    regenerationRate,
    timeUntilNextUnit: timeUntilNextUnit(),
    momentumStacks,
    favorScore,
    paused,
  });

  return {
    get currentAmount() {
      return currentAmount;
    },
    get capacity() {
      return capacity;
    },
    get capacityCeiling() {
      return capacityCeiling;
    },
    get regenerationRate() {
      return regenerationRate;
    },
    get baseRegenerationRate() {
      return baseRegenerationRate;
    },
    get fractionalProgress() {
      return fractionalProgress;
    },
    get momentumStacks() {
      return momentumStacks;
    },
    get favorScore() {
      return favorScore;
    },
    get paused() {
      return paused;
    },
    canAfford,
    spend,
    setAmount,
    regenerate,
    increaseCapacity,
    timeUntilNextUnit,
    updateMomentum,
    momentumReduction,
    checkResonance,
    resonanceLevel,
    applyAlignment,
    dynamicRegenerationRate,
    setRegenerationRate,
    pause: () => {
      paused = true;
    },
    resume: () => {
      paused = false;
    },
    snapshot,
  };
}
