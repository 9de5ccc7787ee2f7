import { describe, expect, it } from "vitest";
import { createResourceTimer } from "../resourceTimer";

describe("createResourceTimer", () => {
  it("regenerates three units over nine seconds at a third of a unit per second", () => {
    const pool = createResourceTimer({
      capacity: 6,
      startingAmount: 0,
      regenerationRate: 1 / 3,
    });

    for (let i = 0; i < 90; i += 1) {
      pool.regenerate(0.1);
    }

    expect(pool.currentAmount).toBe(3);
  });

  it("lands the same whole units however the time is sliced", () => {
    const coarse = createResourceTimer({ capacity: 6, regenerationRate: 0.5 });
    const fine = createResourceTimer({ capacity: 6, regenerationRate: 0.5 });

    coarse.regenerate(7);
    for (let i = 0; i < 700; i += 1) {
      fine.regenerate(0.01);
    }

    expect(coarse.currentAmount).toBe(3);
    expect(fine.currentAmount).toBe(3);
  });

  it("keeps fractional progress between calls", () => {
    const pool = createResourceTimer({ capacity: 6, regenerationRate: 1 / 3 });

    pool.regenerate(2);

    expect(pool.currentAmount).toBe(0);
    expect(pool.timeUntilNextUnit()).toBeCloseTo(1, 9);
  });

  it("caps at capacity", () => {
    const pool = createResourceTimer({
      capacity: 6,
      startingAmount: 5,
      regenerationRate: 1,
    });

    pool.regenerate(10);
    expect(pool.currentAmount).toBe(6);
    expect(pool.fractionalProgress).toBe(0);
    expect(pool.timeUntilNextUnit()).toBe(Infinity);

    pool.spend(6);
    pool.regenerate(0.5);
    expect(pool.currentAmount).toBe(0);
  });

  it("carries the remainder past the step that fills the pool", () => {
    const pool = createResourceTimer({
      capacity: 6,
      startingAmount: 5,
      regenerationRate: 1,
    });

    pool.regenerate(1.5);
    expect(pool.currentAmount).toBe(6);
    expect(pool.fractionalProgress).toBeCloseTo(0.5, 9);

    pool.regenerate(2);
    expect(pool.fractionalProgress).toBeCloseTo(0.5, 9);

    pool.spend(1);
    expect(pool.timeUntilNextUnit()).toBeCloseTo(0.5, 9);
  });

  it("reports Infinity when the rate is zero", () => {
    const pool = createResourceTimer({ capacity: 6, regenerationRate: 0 });
    pool.regenerate(100);

    expect(pool.currentAmount).toBe(0);
    expect(pool.timeUntilNextUnit()).toBe(Infinity);
  });

  it("spends atomically and never partially", () => {
    const pool = createResourceTimer({ capacity: 6, startingAmount: 3 });

    expect(pool.spend(2)).toBe(true);
    expect(pool.currentAmount).toBe(1);
    expect(pool.spend(2)).toBe(false);
    expect(pool.spend(1.5)).toBe(false);
    expect(pool.spend(-1)).toBe(false);
    expect(pool.spend(7)).toBe(false);
    expect(pool.currentAmount).toBe(1);
    expect(pool.spend(0)).toBe(true);
    expect(pool.currentAmount).toBe(1);
  });

  it("clamps setAmount into [0, capacity]", () => {
    const pool = createResourceTimer({ capacity: 6 });

    pool.setAmount(4.7);
    expect(pool.currentAmount).toBe(4);
    pool.setAmount(99);
    expect(pool.currentAmount).toBe(6);
    pool.setAmount(-3);
    expect(pool.currentAmount).toBe(0);
    pool.setAmount(Number.NaN);
    expect(pool.currentAmount).toBe(0);
  });

  it("limits capacity to the ceiling", () => {
    const pool = createResourceTimer({
      capacity: 6,
      capacityCeiling: 8,
      startingAmount: 2,
    });

    expect(pool.increaseCapacity(1)).toBe(true);
    expect(pool.capacity).toBe(7);
    expect(pool.currentAmount).toBe(3);

    expect(pool.increaseCapacity(2)).toBe(false);
    expect(pool.capacity).toBe(7);

    expect(pool.increaseCapacity(1, { grant: false })).toBe(true);
    expect(pool.capacity).toBe(8);
    expect(pool.currentAmount).toBe(3);

    expect(pool.increaseCapacity(0)).toBe(false);
    expect(pool.increaseCapacity(1.5)).toBe(false);
    expect(createResourceTimer({ capacity: 10, capacityCeiling: 8 }).capacity).toBe(8);
  });

  it("stacks momentum on strictly descending costs", () => {
    const pool = createResourceTimer({ momentumCap: 3, momentumStackLimit: 5 });

    [6, 5, 4, 3, 2].forEach((cost) => pool.updateMomentum(cost));
    expect(pool.momentumStacks).toBe(4);
    expect(pool.momentumReduction()).toBe(3);

    pool.updateMomentum(2);
    expect(pool.momentumStacks).toBe(0);
    expect(pool.momentumReduction()).toBe(0);
  });

  it("stops stacking momentum at the stack limit", () => {
    const pool = createResourceTimer({ momentumStackLimit: 2 });

    [5, 4, 3, 2].forEach((cost) => pool.updateMomentum(cost));

    expect(pool.momentumStacks).toBe(2);
  });

  it("grades resonance against the current amount", () => {
    const pool = createResourceTimer({ startingAmount: 3, resonanceTolerance: 1 });

    expect(pool.resonanceLevel(3)).toBe("perfect");
    expect(pool.resonanceLevel(2)).toBe("minor");
    expect(pool.resonanceLevel(4)).toBe("minor");
    expect(pool.resonanceLevel(5)).toBe("none");
    expect(pool.checkResonance(4)).toBe(true);
    expect(pool.checkResonance(5)).toBe(false);
  });

  it("keeps favor inside the bound", () => {
    const pool = createResourceTimer({ favorBound: 2 });

    for (let i = 0; i < 3; i += 1) pool.applyAlignment("order");
    expect(pool.favorScore).toBe(2);

    for (let i = 0; i < 5; i += 1) pool.applyAlignment("chaos");
    expect(pool.favorScore).toBe(-2);

    pool.applyAlignment("balance");
    expect(pool.favorScore).toBe(-2);
  });

  it("derives the dynamic rate from vitals, fill level and favor", () => {
    const pool = createResourceTimer({ capacity: 6, regenerationRate: 1 });

    expect(pool.dynamicRegenerationRate(1, false)).toBe(1);
    expect(pool.dynamicRegenerationRate(0.2, false)).toBeCloseTo(1.5);
    expect(pool.dynamicRegenerationRate(0.5, false)).toBeCloseTo(1.2);
    expect(pool.dynamicRegenerationRate(1, true)).toBeCloseTo(1.25);
    expect(pool.dynamicRegenerationRate(0.2, true)).toBeCloseTo(1.875);

    pool.setAmount(5);
    expect(pool.dynamicRegenerationRate(1, false)).toBeCloseTo(0.5);
  });

  it("applies favor multipliers past the thresholds", () => {
    const blessed = createResourceTimer({ regenerationRate: 1 });
    for (let i = 0; i < 6; i += 1) blessed.applyAlignment("order");
    expect(blessed.dynamicRegenerationRate(1, false)).toBeCloseTo(1.3);

    const cursed = createResourceTimer({ regenerationRate: 1 });
    for (let i = 0; i < 6; i += 1) cursed.applyAlignment("chaos");
    expect(cursed.dynamicRegenerationRate(1, false)).toBeCloseTo(0.7);
  });

  it("ignores invalid regeneration rates", () => {
    const pool = createResourceTimer({ regenerationRate: 0.5 });

    pool.setRegenerationRate(-1);
    pool.setRegenerationRate(Number.NaN);
    expect(pool.regenerationRate).toBe(0.5);

    pool.setRegenerationRate(2);
    expect(pool.regenerationRate).toBe(2);
    expect(pool.baseRegenerationRate).toBe(0.5);
  });

  it("holds regeneration while paused", () => {
    const pool = createResourceTimer({ capacity: 6, regenerationRate: 1 });

    pool.pause();
    pool.regenerate(3);
    expect(pool.currentAmount).toBe(0);
    expect(pool.timeUntilNextUnit()).toBe(Infinity);
    expect(pool.snapshot()).toMatchObject({ paused: true, timeUntilNextUnit: Infinity });

    pool.resume();
    pool.regenerate(3);
    expect(pool.currentAmount).toBe(3);
  });

  it("rejects invalid pool settings", () => {
    expect(() => createResourceTimer({ capacity: 5.5 })).toThrow(
      'Initiative config "capacity" must be an integer, got 5.5'
    );
    expect(() => createResourceTimer({ capacityCeiling: 0 })).toThrow(
      'Initiative config "capacityCeiling" must be positive'
    );
    expect(() => createResourceTimer({ startingAmount: 2.5 })).toThrow(
      'Initiative config "startingAmount" must be an integer, got 2.5'
    );
    expect(() => createResourceTimer({ momentumCap: -1 })).toThrow(
      'Invalid initiative config "momentumCap": -1'
    );
    expect(() => createResourceTimer({ regenerationRate: -2 })).toThrow(
      "Invalid pool regeneration rate: -2"
    );
    expect(() => createResourceTimer({ regenerationRate: Infinity })).toThrow(
      "Invalid pool regeneration rate: Infinity"
    );
    expect(createResourceTimer({ regenerationRate: 0 }).regenerationRate).toBe(0);
  });

  it("snapshots the gauge", () => {
    const pool = createResourceTimer({
      capacity: 6,
      startingAmount: 2,
      regenerationRate: 0.5,
    });

    expect(pool.snapshot()).toEqual({
      currentAmount: 2,
      capacity: 6,
      regenerationRate: 0.5,
      timeUntilNextUnit: 2,
      momentumStacks: 0,
      favorScore: 0,
      paused: false,
    });
  });
});
