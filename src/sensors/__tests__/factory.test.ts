import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors.js";
import type { SensorConfig } from "../../models.js";
import { Bme280Sensor } from "../bme280.js";
import { Dht22Sensor } from "../dht22.js";
import type { DhtHandle } from "../drivers.js";
import { Ds18b20Sensor } from "../ds18b20.js";
import { type SensorDrivers, SensorFactory } from "../factory.js";
import { DriverHandleRegistry } from "../handle-registry.js";
import {
  FakeBme280Driver,
  FakeDhtDriver,
  bme280Config,
  dht22Config,
  ds18b20Config,
  memoryOneWire,
} from "../../__tests__/test-helpers.js";

function drivers(): SensorDrivers {
  const dht = new FakeDhtDriver([]);
  return {
    oneWire: memoryOneWire({}),
    dhtHandles: new DriverHandleRegistry<number, DhtHandle>((pin) => dht.open(pin), 0, async () => {}),
    bme280: new FakeBme280Driver({}),
  };
}

describe("SensorFactory", () => {
  it("should create the variant matching each sensor type", () => {
    const deps = drivers();

    expect(SensorFactory.createSensor(ds18b20Config(), deps)).toBeInstanceOf(Ds18b20Sensor);
    expect(SensorFactory.createSensor(dht22Config(), deps)).toBeInstanceOf(Dht22Sensor);
    expect(SensorFactory.createSensor(bme280Config(), deps)).toBeInstanceOf(Bme280Sensor);
  });

  it("should expose the quantities of each type", () => {
    const deps = drivers();

    expect(SensorFactory.createSensor(ds18b20Config(), deps).quantities).toEqual(["temperature"]);
    expect(SensorFactory.createSensor(dht22Config(), deps).quantities).toEqual(["temperature", "humidity"]);
    expect(SensorFactory.createSensor(bme280Config(), deps).quantities).toEqual([
      "temperature",
      "humidity",
      "pressure",
    ]);
  });

  it("should reject an unknown sensor type with a configuration error", () => {
    const unknown = { ...ds18b20Config(), type: "sht31" } as unknown as SensorConfig;

    expect(() => SensorFactory.createSensor(unknown, drivers())).toThrow(ConfigurationError);
  });
});
