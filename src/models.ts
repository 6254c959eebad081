import type { SensorError } from "./errors.js";

export type Quantity = "temperature" | "humidity" | "pressure";

/**
 * Quantities measured by each supported sensor type, in publish order.
 * ds18b20 is the single-value family, dht22 the dual-value one and
 * bme280 the triple-value one.
 */
export const SENSOR_QUANTITIES = {
  ds18b20: ["temperature"],
  dht22: ["temperature", "humidity"],
  bme280: ["temperature", "humidity", "pressure"],
} as const satisfies Record<string, readonly Quantity[]>;

export type SensorType = keyof typeof SENSOR_QUANTITIES;

export const SENSOR_TYPE_ALIASES: Record<string, SensorType> = {
  "single-value": "ds18b20",
  "dual-value": "dht22",
  "triple-value": "bme280",
};

/**
 * Map a family alias to its sensor type; other names are returned as given.
 */
export function resolveSensorType(name: string): string {
  return Object.hasOwn(SENSOR_TYPE_ALIASES, name) ? SENSOR_TYPE_ALIASES[name] : name;
}

export function isSensorType(value: string): value is SensorType {
  return Object.hasOwn(SENSOR_QUANTITIES, value);
}

interface SensorConfigBase {
  /** INI section the sensor was read from, e.g. "sensor_garage". */
  section: string;
  deviceName: string;
  slug: string;
  uniqueId: string;
  stateTopic: string;
  discoveryPrefix: string;
  units: Partial<Record<Quantity, string>>;
  deviceClass?: string;
}

export interface Ds18b20Config extends SensorConfigBase {
  type: "ds18b20";
  sensorFile: string;
}

export interface Dht22Config extends SensorConfigBase {
  type: "dht22";
  pin: number;
}

export interface Bme280Config extends SensorConfigBase {
  type: "bme280";
  i2cAddress: number;
  i2cBus: number;
}

export type SensorConfig = Ds18b20Config | Dht22Config | Bme280Config;

export type Reading = Readonly<Partial<Record<Quantity, number>>>;

export type ReadResult =
  | { ok: true; reading: Reading }
  | { ok: false; error: SensorError };

/**
 * Home Assistant "device" block shared by every discovery message of a host.
 */
export interface DeviceDescriptor {
  readonly identifiers: readonly string[];
  readonly name: string;
  readonly model: string;
  readonly manufacturer: string;
  readonly sw_version?: string;
}

export interface DiscoveryMessage {
  name: string;
  state_topic: string;
  unit_of_measurement: string;
  device_class: string;
  state_class: "measurement";
  value_template: string;
  unique_id: string;
  device: DeviceDescriptor;
  origin: {
    name: string;
    sw_version: string;
  };
}

export interface DiscoveryEntry {
  topicSuffix: string;
  topic: string;
  payload: DiscoveryMessage;
}
