import lodash from "lodash";
import { type SensorError, type SensorErrorContext, TransientReadError, asSensorError } from "../errors.js";
import {
  type Quantity,
  type ReadResult,
  type Reading,
  SENSOR_QUANTITIES,
  type SensorConfig,
  type SensorType,
} from "../models.js";

const { round } = lodash;

/**
 * Base class for all sensors.
 * Variants only implement `sample()`; the read policy lives here: every
 * quantity of the sensor type must be present and finite, values are rounded
 * to the variant's precision, and nothing thrown escapes `read()`.
 */
export abstract class Sensor<C extends SensorConfig = SensorConfig> {
  protected readonly config: C;

  /** Decimal places kept in a reading. */
  protected abstract readonly precision: number;

  constructor(config: C) {
    this.config = config;
  }

  get type(): SensorType {
    return this.config.type;
  }

  get section(): string {
    return this.config.section;
  }

  get deviceName(): string {
    return this.config.deviceName;
  }

  get stateTopic(): string {
    return this.config.stateTopic;
  }

  get quantities(): readonly Quantity[] {
    return SENSOR_QUANTITIES[this.config.type];
  }

  get context(): SensorErrorContext {
    return {
      sensorType: this.config.type,
      deviceName: this.config.deviceName,
      section: this.config.section,
    };
  }

  /**
   * Take one raw sample from the driver. May throw.
   */
  protected abstract sample(): Promise<Partial<Record<Quantity, number>>>;

  /**
   * Called with the typed error after any failed read.
   */
  protected onFailure(_error: SensorError): void {}

  async read(): Promise<ReadResult> {
    try {
      const raw = await this.sample();
      return { ok: true, reading: this.toReading(raw) };
    } catch (err) {
      const error = asSensorError(err, this.context);
      this.onFailure(error);
      return { ok: false, error };
    }
  }

  private toReading(raw: Partial<Record<Quantity, number>>): Reading {
    const reading: Partial<Record<Quantity, number>> = {};
    for (const quantity of this.quantities) {
      const value = raw[quantity];
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new TransientReadError(`Sample is missing ${quantity}`, this.context);
      }
      reading[quantity] = round(value, this.precision);
    }
    return Object.freeze(reading);
  }
}
