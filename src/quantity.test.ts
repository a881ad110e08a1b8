import { describe, it, expect } from "vitest";
import { inferUnitsFromTitle, isValidQuantity, parsePositiveInt, resolveQuantity, type QuantityOptions } from "./quantity";
import { makeOrder } from "./testing/fakes";

const options: QuantityOptions = {
  minUnits: 100,
  listingMultipliers: new Map<string, number>(),
  titleInference: true,
};

describe("parsePositiveInt", () => {
  it("accepts integers with surrounding and inner spaces", () => {
    expect(parsePositiveInt(" 42 ")).toBe(42);
    expect(parsePositiveInt("1 000")).toBe(1000);
    expect(parsePositiveInt(7)).toBe(7);
  });

  it("treats anything else as absent", () => {
    expect(parsePositiveInt("0")).toBeNull();
    expect(parsePositiveInt("-5")).toBeNull();
    expect(parsePositiveInt("12abc")).toBeNull();
    expect(parsePositiveInt("")).toBeNull();
    expect(parsePositiveInt(2.5)).toBeNull();
    expect(parsePositiveInt(null)).toBeNull();
    expect(parsePositiveInt(undefined)).toBeNull();
    expect(parsePositiveInt(true)).toBeNull();
    expect(parsePositiveInt({ value: 5 })).toBeNull();
  });
});

describe("isValidQuantity", () => {
  it("requires the minimum and multiples of 100", () => {
    expect(isValidQuantity(500, 100)).toBe(true);
    expect(isValidQuantity(150, 100)).toBe(false);
    expect(isValidQuantity(100, 200)).toBe(false);
    expect(isValidQuantity(0, 0)).toBe(false);
  });
});

describe("inferUnitsFromTitle", () => {
  it("reads an explicit points phrase", () => {
    expect(inferUnitsFromTitle("1 000 points for Steam", 100)).toBe(1000);
    expect(inferUnitsFromTitle("Steam очки 5000 очков", 100)).toBe(5000);
  });

  it("falls back to the largest qualifying number", () => {
    expect(inferUnitsFromTitle("Steam Points 2024 pack 500 | 1500", 100)).toBe(1500);
  });

  it("ignores numbers below the minimum or off the 100 grid", () => {
    expect(inferUnitsFromTitle("Steam 50 / 150", 100)).toBeNull();
  });

  it("is disabled by a starting-from marker", () => {
    expect(inferUnitsFromTitle("Steam points from 100 points", 100)).toBeNull();
    expect(inferUnitsFromTitle("Points, starting from 500", 100)).toBeNull();
    expect(inferUnitsFromTitle("Очки Steam от 100", 100)).toBeNull();
  });

  it("returns null for titles without numbers", () => {
    expect(inferUnitsFromTitle("Steam points", 100)).toBeNull();
    expect(inferUnitsFromTitle("", 100)).toBeNull();
  });
});

describe("resolveQuantity", () => {
  it("uses the first parsable buyer parameter", () => {
    const order = makeOrder({ buyer_params: { comment: "hello", qty: " 1 000 ", other: "300" } });
    expect(resolveQuantity(order, options)).toEqual({ units: 1000, source: "buyer_params:qty" });
  });

  it("keeps the stored order of listed parameters, numeric names included", () => {
    const order = makeOrder({
      buyer_params: [
        { name: "comment", value: "hi" },
        { name: "qty", value: "700" },
        { name: "1", value: "300" },
      ],
    });
    expect(resolveQuantity(order, options)).toEqual({ units: 700, source: "buyer_params:qty" });
  });

  it("skips parameters that are neither text nor numbers", () => {
    const order = makeOrder({ buyer_params: { comment: null, gift: true, qty: "500" } });
    expect(resolveQuantity(order, options)).toEqual({ units: 500, source: "buyer_params:qty" });
  });

  it("falls back to the item count", () => {
    const order = makeOrder({ buyer_params: { note: "abc" }, amount: "3" });
    expect(resolveQuantity(order, options)).toEqual({ units: 3, source: "amount" });
  });

  it("reports not found", () => {
    const order = makeOrder({ buyer_params: { note: "abc" }, amount: null });
    expect(resolveQuantity(order, options)).toEqual({ units: null, source: "not_found" });
  });

  it("multiplies a configured listing multiplier by the item count", () => {
    const order = makeOrder({ listing_id: "42", amount: "2", buyer_params: { qty: "700" } });
    const withMultiplier = { ...options, listingMultipliers: new Map([["42", 1000]]) };
    expect(resolveQuantity(order, withMultiplier)).toEqual({ units: 2000, source: "listing:42" });
  });

  it("floors the item count at one", () => {
    const order = makeOrder({ listing_id: "42", amount: "0" });
    const withMultiplier = { ...options, listingMultipliers: new Map([["42", 500]]) };
    expect(resolveQuantity(order, withMultiplier)).toEqual({ units: 500, source: "listing:42" });
  });

  it("multiplies a title phrase by the item count", () => {
    for (const perItem of [100, 500, 1000, 25000]) {
      for (const count of [1, 2, 5]) {
        const order = makeOrder({ title: `Steam ${perItem} points`, amount: String(count) });
        expect(resolveQuantity(order, options)).toEqual({ units: perItem * count, source: "title" });
      }
    }
  });

  it("lets buyer parameters decide for starting-from titles", () => {
    const order = makeOrder({ title: "Steam points from 100 points", buyer_params: { qty: "700" } });
    expect(resolveQuantity(order, options)).toEqual({ units: 700, source: "buyer_params:qty" });
  });

  it("skips the title when inference is off", () => {
    const order = makeOrder({ title: "1000 points", amount: "1" });
    expect(resolveQuantity(order, { ...options, titleInference: false })).toEqual({ units: 1, source: "amount" });
  });
});
