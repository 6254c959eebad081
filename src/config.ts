import { readFileSync } from "node:fs";
import ini from "ini";
import { z } from "zod";
import { ConfigurationError, type SensorErrorContext, errorMessage } from "./errors.js";
import {
  type DeviceDescriptor,
  type Quantity,
  type SensorConfig,
  isSensorType,
  resolveSensorType,
} from "./models.js";
import { buildDeviceDescriptor } from "./sensors/homeassistant.js";
import { slugify } from "./utils.js";

function stringEnvVar(envVarName: keyof typeof process["env"], defaultValue: string): string;
function stringEnvVar(envVarName: keyof typeof process["env"], defaultValue: null): string | undefined;
function stringEnvVar(
  envVarName: keyof typeof process["env"],
  defaultValue: string | null,
): string | undefined {
  const value = process.env[envVarName];
  return value ?? defaultValue ?? undefined;
}

function boolEnvVar(
  envVarName: keyof typeof process["env"],
  defaultValue = false,
): boolean {
  const value = stringEnvVar(envVarName, null);
  if (value == null) {
    return defaultValue;
  }
  return value === "true";
}

export const SENSOR_SECTION_PREFIX = "sensor_";

/** Blank values (`username =`) count as absent. */
function blankAsAbsent(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const optionalText = z.preprocess(blankAsAbsent, z.string().trim().min(1).optional());

const MqttSectionSchema = z.object({
  host: z.string().trim().min(1),
  port: z.coerce.number().int().min(1).max(65535).default(1883),
  username: optionalText,
  password: z.preprocess(blankAsAbsent, z.string().optional()),
  client_id: optionalText,
});

const MainSectionSchema = z.object({
  sleep_interval: z.coerce.number().positive().default(60),
});

const DeviceSectionSchema = z.object({
  identifiers: z.string().optional(),
  name: z.string().optional(),
  model: z.string().optional(),
  manufacturer: z.string().optional(),
  sw_version: z.string().optional(),
});

const SensorSectionSchema = z.object({
  type: z.string().trim().toLowerCase().default("ds18b20"),
  device_name: z.string().trim().min(1),
  topic: optionalText,
  unique_id: optionalText,
  discovery_prefix: z.string().trim().min(1).default("homeassistant"),
  temperature_unit: optionalText,
  humidity_unit: optionalText,
  pressure_unit: optionalText,
  unit_of_measurement: optionalText,
  device_class: optionalText,
});

const Ds18b20SectionSchema = z.object({
  sensor_file: z.string().trim().min(1),
});

const Dht22SectionSchema = z.object({
  pin: z.coerce.number().int().nonnegative().default(4),
});

const i2cAddress = z
  .string()
  .default("0x76")
  .transform((value, ctx) => {
    const address = Number(value.trim());
    if (!Number.isInteger(address) || address < 0 || address > 0x7f) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not an I2C address` });
      return z.NEVER;
    }
    return address;
  });

const Bme280SectionSchema = z.object({
  i2c_address: i2cAddress,
  i2c_bus: z.coerce.number().int().nonnegative().default(1),
});

export interface MqttConfig {
  host: string;
  port: number;
  url: string;
  clientId: string;
  username?: string;
  password?: string;
}

export interface AppConfig {
  mqtt: MqttConfig;
  /** Seconds between poll cycles. */
  sleepInterval: number;
  device: DeviceDescriptor;
  sensors: SensorConfig[];
  /** Sensor sections skipped for this run. */
  rejected: ConfigurationError[];
  verbose: boolean;
}

function parseSection<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  section: string,
  context?: SensorErrorContext,
): z.output<T> {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "section"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid [${section}] section: ${details}`, { section, ...context });
  }
  return result.data;
}

function definedUnits(units: Partial<Record<Quantity, string | undefined>>): Partial<Record<Quantity, string>> {
  const result: Partial<Record<Quantity, string>> = {};
  for (const [quantity, unit] of Object.entries(units)) {
    if (unit !== undefined && (quantity === "temperature" || quantity === "humidity" || quantity === "pressure")) {
      result[quantity] = unit;
    }
  }
  return result;
}

/**
 * Turn one [sensor_*] section into a typed sensor configuration.
 * Throws ConfigurationError for unknown types and missing parameters.
 */
export function parseSensorSection(section: string, raw: unknown, hostname: string): SensorConfig {
  const common = parseSection(SensorSectionSchema, raw, section);
  const type = resolveSensorType(common.type);
  const context = { section, deviceName: common.device_name, sensorType: type };
  if (!isSensorType(type)) {
    throw new ConfigurationError(`Unknown sensor type '${common.type}'`, context);
  }

  const slug = slugify(common.device_name);
  const base = {
    section,
    deviceName: common.device_name,
    slug,
    uniqueId: common.unique_id ?? `${hostname}_${slug}`,
    stateTopic: common.topic ?? `${hostname}/${slug}/state`,
    discoveryPrefix: common.discovery_prefix,
  };

  switch (type) {
    case "ds18b20": {
      const params = parseSection(Ds18b20SectionSchema, raw, section, context);
      return {
        ...base,
        type,
        units: definedUnits({ temperature: common.temperature_unit ?? common.unit_of_measurement }),
        ...(common.device_class !== undefined ? { deviceClass: common.device_class } : {}),
        sensorFile: params.sensor_file,
      };
    }
    case "dht22": {
      const params = parseSection(Dht22SectionSchema, raw, section, context);
      return {
        ...base,
        type,
        units: definedUnits({ temperature: common.temperature_unit, humidity: common.humidity_unit }),
        pin: params.pin,
      };
    }
    case "bme280": {
      const params = parseSection(Bme280SectionSchema, raw, section, context);
      return {
        ...base,
        type,
        units: definedUnits({
          temperature: common.temperature_unit,
          humidity: common.humidity_unit,
          pressure: common.pressure_unit,
        }),
        i2cAddress: params.i2c_address,
        i2cBus: params.i2c_bus,
      };
    }
  }
}

const OPTION_LINE = /^([^=:;#[\s][^=:]*?)\s*[=:]\s*(.*)$/;

/**
 * Quote every option value so `ini` keeps `;` and `#` inside values.
 * Only lines starting with `;` or `#` are comments, and both `key = value`
 * and `key: value` are accepted.
 */
export function quoteIniValues(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => {
      const match = OPTION_LINE.exec(line.trim());
      return match ? `${match[1]} = ${JSON.stringify(match[2].trimEnd())}` : line;
    })
    .join("\n");
}

/**
 * Parse INI configuration text. Problems in [MQTT], [MAIN] or [DEVICE] are
 * fatal; a broken sensor section only rejects that sensor.
 */
export function parseConfig(text: string, hostname: string): AppConfig {
  const parsed: Record<string, unknown> = ini.parse(quoteIniValues(text));

  const mqtt = parseSection(MqttSectionSchema, parsed.MQTT, "MQTT");
  const main = parseSection(MainSectionSchema, parsed.MAIN, "MAIN");
  const deviceSection = parseSection(DeviceSectionSchema, parsed.DEVICE, "DEVICE");

  const sensors: SensorConfig[] = [];
  const rejected: ConfigurationError[] = [];
  const uniqueIds = new Set<string>();

  for (const [section, raw] of Object.entries(parsed)) {
    if (!section.startsWith(SENSOR_SECTION_PREFIX) || typeof raw !== "object" || raw === null) {
      continue;
    }
    try {
      const sensor = parseSensorSection(section, raw, hostname);
      if (uniqueIds.has(sensor.uniqueId)) {
        throw new ConfigurationError(`Duplicate unique id '${sensor.uniqueId}'`, {
          section,
          deviceName: sensor.deviceName,
          sensorType: sensor.type,
        });
      }
      uniqueIds.add(sensor.uniqueId);
      sensors.push(sensor);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) {
        throw err;
      }
      rejected.push(err);
    }
  }

  return {
    mqtt: {
      host: mqtt.host,
      port: mqtt.port,
      url: `mqtt://${mqtt.host}:${mqtt.port}`,
      clientId: mqtt.client_id ?? `sensor2mqtt-${hostname}`,
      username: mqtt.username,
      password: stringEnvVar("S2M_MQTT_PASSWORD", null) ?? mqtt.password,
    },
    sleepInterval: main.sleep_interval,
    device: buildDeviceDescriptor(deviceSection, hostname),
    sensors,
    rejected,
    verbose: boolEnvVar("S2M_VERBOSE"),
  };
}

export function loadConfig(path: string, hostname: string): AppConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read configuration file ${path}: ${errorMessage(err)}`, undefined, err);
  }
  return parseConfig(text, hostname);
}

export function anonymizeConfig(config: AppConfig): Omit<AppConfig, "rejected"> & { rejected: string[] } {
  return {
    ...config,
    mqtt: {
      ...config.mqtt,
      password: config.mqtt.password != null ? "***" : undefined,
    },
    rejected: config.rejected.map((err) => err.describe()),
  };
}
