import type { Bme280Config, Quantity } from "../models.js";
import { Sensor } from "./base.js";
import type { Bme280Driver } from "./drivers.js";

/**
 * Triple-value I2C environmental sensor. Every read opens its own bus
 * session and takes all three quantities in one transaction.
 */
export class Bme280Sensor extends Sensor<Bme280Config> {
  protected readonly precision = 2;

  constructor(
    config: Bme280Config,
    private readonly driver: Bme280Driver,
  ) {
    super(config);
  }

  protected async sample(): Promise<Partial<Record<Quantity, number>>> {
    const session = await this.driver.open({
      i2cBus: this.config.i2cBus,
      i2cAddress: this.config.i2cAddress,
    });
    try {
      return await session.read();
    } finally {
      await session.close();
    }
  }
}
