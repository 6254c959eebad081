import { TransientReadError } from "../errors.js";
import type { Ds18b20Config, Quantity } from "../models.js";
import { Sensor } from "./base.js";
import type { OneWireSource } from "./drivers.js";

/**
 * Bare values above this magnitude are millidegrees.
 * Existing probes depend on the exact value.
 */
export const MILLIDEGREE_THRESHOLD = 170;

/**
 * Parse one-wire probe output into degrees Celsius.
 *
 * Driver versions disagree on the format: the `w1_slave` dump carries the
 * value as `t=<millidegrees>`, while the bare `temperature` attribute is
 * millidegrees on some kernels and degrees on others. Bare values are told
 * apart by magnitude only (see MILLIDEGREE_THRESHOLD).
 */
export function parseOneWireTemperature(raw: string): number {
  const [firstLine] = raw.split("\n");
  if (firstLine.includes("crc=") && firstLine.trim().endsWith("NO")) {
    throw new TransientReadError("One-wire CRC check failed");
  }

  const marker = /t=(-?\d+)/.exec(raw);
  if (marker) {
    return Number.parseInt(marker[1], 10) / 1000;
  }

  const value = Number.parseFloat(raw.trim());
  if (!Number.isFinite(value)) {
    throw new TransientReadError(`Unparseable one-wire payload '${raw.trim()}'`);
  }
  return Math.abs(value) > MILLIDEGREE_THRESHOLD ? value / 1000 : value;
}

/**
 * Single-value one-wire temperature probe.
 */
export class Ds18b20Sensor extends Sensor<Ds18b20Config> {
  protected readonly precision = 1;

  constructor(
    config: Ds18b20Config,
    private readonly source: OneWireSource,
  ) {
    super(config);
  }

  protected async sample(): Promise<Partial<Record<Quantity, number>>> {
    const raw = await this.source.read(this.config.sensorFile);
    return { temperature: parseOneWireTemperature(raw) };
  }
}
