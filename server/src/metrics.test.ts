import { describe, expect, it } from "vitest";
import {
  extractChargePercent,
  extractTemperature,
  parseBatteryMetrics,
} from "./metrics.js";

const FULL_DUMP = [
  '      "DesignCapacity" = 2000',
  '      "AppleRawMaxCapacity" = 1800',
  '      "CycleCount" = 123',
  '      "Serial" = "F8Y1234ABCD"',
  '      "Temperature" = 3742',
  '      "CurrentCapacity" = 76',
  '      "AppleRawCurrentCapacity" = 3500',
].join("\n");

describe("parseBatteryMetrics", () => {
  it("extracts every recognised field", () => {
    expect(parseBatteryMetrics(FULL_DUMP)).toEqual({
      designCapacityMilliampHours: 2000,
      maxCapacityMilliampHours: 1800,
      cycleCount: 123,
      serialNumber: "F8Y1234ABCD",
      temperatureCelsius: 37.42,
      chargePercent: 76,
    });
  });

  it("populates only the fields present", () => {
    expect(parseBatteryMetrics('  "CycleCount" = 5\n  "Serial" = "ABC"')).toEqual({
      cycleCount: 5,
      serialNumber: "ABC",
    });
  });

  it("returns an empty patch for unrelated text", () => {
    expect(parseBatteryMetrics("no battery here")).toEqual({});
  });

  it("ignores keys nested inside dictionaries", () => {
    expect(parseBatteryMetrics('"BatteryData" = {"DesignCapacity"=4382,"CycleCount"=9}')).toEqual({});
  });

  it("drops a malformed field without affecting the others", () => {
    const text = '"CycleCount" = abc\n"DesignCapacity" = 5000';
    expect(parseBatteryMetrics(text)).toEqual({ designCapacityMilliampHours: 5000 });
  });

  it("treats integers beyond the safe range as absent", () => {
    expect(parseBatteryMetrics('"CycleCount" = 99999999999999999999')).toEqual({});
  });
});

describe("extractTemperature", () => {
  it("converts hundredths of a degree", () => {
    expect(extractTemperature('"Temperature" = 3742')).toBe(37.42);
  });

  it("prefers VirtualTemperature", () => {
    expect(extractTemperature('"Temperature" = 3000\n"VirtualTemperature" = 3100')).toBe(31);
  });
});

describe("extractChargePercent", () => {
  it("does not confuse AppleRawCurrentCapacity", () => {
    expect(extractChargePercent('"AppleRawCurrentCapacity" = 3500')).toBeUndefined();
  });

  it("rejects values above 100", () => {
    expect(extractChargePercent('"CurrentCapacity" = 250')).toBeUndefined();
  });

  it("accepts 0 and 100", () => {
    expect(extractChargePercent('"CurrentCapacity" = 0')).toBe(0);
    expect(extractChargePercent('"CurrentCapacity" = 100')).toBe(100);
  });
});
