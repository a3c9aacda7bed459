import { describe, expect, it } from "vitest";
import { GestureHistory, StabilityFilter } from "../src";

describe("GestureHistory", () => {
  it("evicts the oldest value once full", () => {
    const history = new GestureHistory(3);
    [1, 2, 3, 4, 5].forEach((v) => history.push(v));
    expect(history.values()).toEqual([3, 4, 5]);
    expect(history.length).toBe(3);
  });

  it("rejects non-positive capacities", () => {
    expect(() => new GestureHistory(0)).toThrow(RangeError);
    expect(() => new GestureHistory(2.5)).toThrow(RangeError);
  });
});

describe("StabilityFilter", () => {
  const defaults = { historyLength: 4, stabilityThreshold: 0.75 };

  it("holds the initial value until the window is full", () => {
    const filter = new StabilityFilter(defaults);
    expect([5, 5, 5].map((raw) => filter.feed(raw))).toEqual([0, 0, 0]);
    expect(filter.getState().ratio).toBeNull();
  });

  it("adopts a value fed capacity times in a row", () => {
    const filter = new StabilityFilter(defaults);
    const outputs = [2, 2, 2, 2].map((raw) => filter.feed(raw));
    expect(outputs).toEqual([0, 0, 0, 2]);
    expect(filter.getState().ratio).toBe(1);
  });

  it("tolerates a single stray frame", () => {
    const filter = new StabilityFilter(defaults);
    [3, 3, 3, 3].forEach((raw) => filter.feed(raw));
    expect(filter.feed(1)).toBe(3);
    expect(filter.getState().ratio).toBe(0.75);
  });

  it("keeps the previous value when no count reaches the threshold", () => {
    const filter = new StabilityFilter(defaults);
    [4, 4, 4, 4].forEach((raw) => filter.feed(raw));
    expect(filter.feed(1)).toBe(4);
    expect(filter.feed(2)).toBe(4);
    expect(filter.getState().history).toEqual([4, 4, 1, 2]);
  });

  it("breaks ties toward the smaller value", () => {
    for (const order of [
      [1, 1, 2, 2],
      [2, 2, 1, 1],
      [2, 1, 2, 1],
    ]) {
      const filter = new StabilityFilter({ historyLength: 4, stabilityThreshold: 0.5 });
      const outputs = order.map((raw) => filter.feed(raw));
      expect(outputs[3]).toBe(1);
    }
  });

  it("starts cold again after reset", () => {
    const filter = new StabilityFilter(defaults);
    [5, 5, 5, 5].forEach((raw) => filter.feed(raw));
    filter.reset();
    expect(filter.getStable()).toBe(0);
    expect([5, 5, 5].map((raw) => filter.feed(raw))).toEqual([0, 0, 0]);
  });
});
