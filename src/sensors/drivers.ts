import { readFile } from "node:fs/promises";
import { ConfigurationError, TransientReadError, errorMessage } from "../errors.js";
import type { Quantity } from "../models.js";

/**
 * Source of raw one-wire text, e.g. /sys/bus/w1/devices/28-xxxx/w1_slave.
 */
export interface OneWireSource {
  read(path: string): Promise<string>;
}

export interface DhtSample {
  temperature: number;
  humidity: number;
}

/**
 * An initialised DHT22 on one GPIO pin.
 */
export interface DhtHandle {
  readonly pin: number;
  sample(): Promise<DhtSample>;
}

export interface DhtDriver {
  open(pin: number): Promise<DhtHandle>;
}

/**
 * One open I2C session with a BME280. Callers must close it.
 */
export interface Bme280Session {
  read(): Promise<Partial<Record<Quantity, number>>>;
  close(): Promise<void>;
}

export interface Bme280Driver {
  open(options: { i2cBus: number; i2cAddress: number }): Promise<Bme280Session>;
}

export const fileOneWireSource: OneWireSource = {
  read: (path) => readFile(path, "utf8"),
};

const DHT22_TYPE = 22;

interface NodeDhtSensor {
  initialize(type: number, pin: number): boolean;
  read(
    type: number,
    pin: number,
    cb: (err: unknown, temperature: number, humidity: number) => void,
  ): void;
}

interface Bme280Module {
  open(options: { i2cBusNumber: number; i2cAddress: number }): Promise<unknown>;
}

interface Bme280Device {
  read(): Promise<unknown>;
  close(): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNodeDhtSensor(value: unknown): value is NodeDhtSensor {
  return isRecord(value) && typeof value.initialize === "function" && typeof value.read === "function";
}

function isBme280Module(value: unknown): value is Bme280Module {
  return isRecord(value) && typeof value.open === "function";
}

function isBme280Device(value: unknown): value is Bme280Device {
  return isRecord(value) && typeof value.read === "function" && typeof value.close === "function";
}

function numberField(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === "number" ? value : undefined;
}

/**
 * Import a driver library that is only present on hosts with the matching
 * bus. CommonJS libraries arrive wrapped in a `default` export.
 */
async function loadOptionalModule(name: string): Promise<unknown> {
  try {
    const mod: unknown = await import(name);
    return isRecord(mod) && "default" in mod ? mod.default : mod;
  } catch (err) {
    throw new ConfigurationError(`Driver library '${name}' is not available: ${errorMessage(err)}`, undefined, err);
  }
}

/**
 * DHT22 access through node-dht-sensor.
 */
export class NodeDhtDriver implements DhtDriver {
  private lib: Promise<NodeDhtSensor> | undefined;

  private load(): Promise<NodeDhtSensor> {
    this.lib ??= loadOptionalModule("node-dht-sensor").then((mod) => {
      if (!isNodeDhtSensor(mod)) {
        throw new ConfigurationError("node-dht-sensor does not expose initialize/read");
      }
      return mod;
    });
    return this.lib;
  }

  async open(pin: number): Promise<DhtHandle> {
    const lib = await this.load();
    if (!lib.initialize(DHT22_TYPE, pin)) {
      throw new TransientReadError(`Could not initialise GPIO ${pin}`);
    }
    return {
      pin,
      sample: () =>
        new Promise<DhtSample>((resolve, reject) => {
          lib.read(DHT22_TYPE, pin, (err, temperature, humidity) => {
            if (err) {
              reject(new TransientReadError(`DHT22 sample failed on GPIO ${pin}: ${errorMessage(err)}`, undefined, err));
              return;
            }
            resolve({ temperature, humidity });
          });
        }),
    };
  }
}

/**
 * BME280 access through the `bme280` package (i2c-bus underneath).
 */
export class I2cBme280Driver implements Bme280Driver {
  private lib: Promise<Bme280Module> | undefined;

  private load(): Promise<Bme280Module> {
    this.lib ??= loadOptionalModule("bme280").then((mod) => {
      if (!isBme280Module(mod)) {
        throw new ConfigurationError("bme280 does not expose open()");
      }
      return mod;
    });
    return this.lib;
  }

  async open(options: { i2cBus: number; i2cAddress: number }): Promise<Bme280Session> {
    const lib = await this.load();
    const device = await lib.open({ i2cBusNumber: options.i2cBus, i2cAddress: options.i2cAddress });
    if (!isBme280Device(device)) {
      throw new TransientReadError(`No BME280 session on bus ${options.i2cBus}`);
    }
    return {
      async read() {
        const data = await device.read();
        if (!isRecord(data)) {
          throw new TransientReadError("BME280 returned no data");
        }
        return {
          temperature: numberField(data, "temperature"),
          humidity: numberField(data, "humidity"),
          pressure: numberField(data, "pressure"),
        };
      },
      close: () => device.close(),
    };
  }
}
