import type { SlowPathPatch } from "@powerlens/shared/types";

/** `"Key" = 123`. The key is quoted so `"CurrentCapacity"` never matches `AppleRawCurrentCapacity`. */
function extractInteger(text: string, key: string): number | undefined {
  const match = new RegExp(`"${key}" = (\\d+)`).exec(text);
  if (!match) return undefined;
  const value = Number(match[1]);
  return Number.isSafeInteger(value) ? value : undefined;
}

/** `"Key" = "value"` */
function extractString(text: string, key: string): string | undefined {
  const match = new RegExp(`"${key}" = "([^"]+)"`).exec(text);
  return match ? match[1] : undefined;
}

export function extractDesignCapacity(text: string): number | undefined {
  return extractInteger(text, "DesignCapacity");
}

export function extractMaxCapacity(text: string): number | undefined {
  return extractInteger(text, "AppleRawMaxCapacity");
}

export function extractCycleCount(text: string): number | undefined {
  return extractInteger(text, "CycleCount");
}

export function extractSerialNumber(text: string): string | undefined {
  return extractString(text, "Serial");
}

/** Percent of full charge; anything above 100 is a misread. */
export function extractChargePercent(text: string): number | undefined {
  const value = extractInteger(text, "CurrentCapacity");
  return value !== undefined && value <= 100 ? value : undefined;
}

/** Hundredths of a degree. VirtualTemperature tracks the cell better when present. */
export function extractTemperature(text: string): number | undefined {
  const raw = extractInteger(text, "VirtualTemperature") ?? extractInteger(text, "Temperature");
  return raw === undefined ? undefined : raw / 100;
}

/**
 * Pull every recognised field out of a battery inventory dump.
 * Only fields that were found are present on the result.
 */
export function parseBatteryMetrics(text: string): SlowPathPatch {
  const patch: SlowPathPatch = {};

  const designCapacity = extractDesignCapacity(text);
  if (designCapacity !== undefined) patch.designCapacityMilliampHours = designCapacity;

  const maxCapacity = extractMaxCapacity(text);
  if (maxCapacity !== undefined) patch.maxCapacityMilliampHours = maxCapacity;

  const cycleCount = extractCycleCount(text);
  if (cycleCount !== undefined) patch.cycleCount = cycleCount;

  const serialNumber = extractSerialNumber(text);
  if (serialNumber !== undefined) patch.serialNumber = serialNumber;

  const chargePercent = extractChargePercent(text);
  if (chargePercent !== undefined) patch.chargePercent = chargePercent;

  const temperature = extractTemperature(text);
  if (temperature !== undefined) patch.temperatureCelsius = temperature;

  return patch;
}
