import type { Quantity } from "../models.js";

/**
 * Default Home Assistant unit and device class per quantity.
 */
export const QUANTITY_DEFAULTS: Record<Quantity, { unit: string; deviceClass: string }> = {
  temperature: { unit: "°C", deviceClass: "temperature" },
  humidity: { unit: "%", deviceClass: "humidity" },
  pressure: { unit: "hPa", deviceClass: "pressure" },
};

/**
 * Unit names accepted in the configuration, mapped to the symbols Home
 * Assistant expects. Keys are lowercase.
 */
const UNIT_MAP: Record<string, string> = {
  // Temperature units
  celsius: "°C",
  c: "°C",
  fahrenheit: "°F",
  f: "°F",
  kelvin: "K",

  // Humidity units
  percent: "%",
  percentage: "%",

  // Pressure units
  hectopascal: "hPa",
  hpa: "hPa",
  pascal: "Pa",
  kilopascal: "kPa",
  millibar: "mbar",
  bar: "bar",
  inhg: "inHg",
  psi: "psi",
};

/**
 * Normalize a configured unit to Home Assistant format.
 * Unknown units are passed through unchanged.
 */
export function normalizeUnit(unit: string | null | undefined): string | undefined {
  if (!unit) {
    return undefined;
  }
  const trimmed = unit.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  const key = trimmed.toLowerCase();
  return Object.hasOwn(UNIT_MAP, key) ? UNIT_MAP[key] : trimmed;
}

/**
 * Template selecting one quantity from the JSON state payload.
 */
export function valueTemplate(quantity: Quantity): string {
  return `{{ value_json.${quantity} }}`;
}
