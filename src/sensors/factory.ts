import { ConfigurationError } from "../errors.js";
import type { SensorConfig } from "../models.js";
import type { Sensor } from "./base.js";
import { Bme280Sensor } from "./bme280.js";
import { DHT_SETTLE_MS, Dht22Sensor, type DhtHandleRegistry } from "./dht22.js";
import { Ds18b20Sensor } from "./ds18b20.js";
import { type Bme280Driver, I2cBme280Driver, NodeDhtDriver, type OneWireSource, fileOneWireSource } from "./drivers.js";
import { DriverHandleRegistry } from "./handle-registry.js";

/**
 * Everything the sensor variants need from the outside world.
 */
export interface SensorDrivers {
  oneWire: OneWireSource;
  dhtHandles: DhtHandleRegistry;
  bme280: Bme280Driver;
}

/**
 * Drivers backed by the filesystem, node-dht-sensor and bme280.
 */
export function createDefaultDrivers(): SensorDrivers {
  const dht = new NodeDhtDriver();
  return {
    oneWire: fileOneWireSource,
    dhtHandles: new DriverHandleRegistry((pin: number) => dht.open(pin), DHT_SETTLE_MS),
    bme280: new I2cBme280Driver(),
  };
}

function unsupported(config: never): never {
  throw new ConfigurationError(`Unsupported sensor configuration ${JSON.stringify(config)}`);
}

/**
 * Sensor factory that creates the sensor variant matching a configuration.
 */
export class SensorFactory {
  static createSensor(config: SensorConfig, drivers: SensorDrivers): Sensor {
    switch (config.type) {
      case "ds18b20":
        return new Ds18b20Sensor(config, drivers.oneWire);
      case "dht22":
        return new Dht22Sensor(config, drivers.dhtHandles);
      case "bme280":
        return new Bme280Sensor(config, drivers.bme280);
      default:
        return unsupported(config);
    }
  }
}
