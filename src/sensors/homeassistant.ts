import type {
  DeviceDescriptor,
  DiscoveryEntry,
  DiscoveryMessage,
  Quantity,
  SensorConfig,
} from "../models.js";
import { SENSOR_QUANTITIES } from "../models.js";
import { QUANTITY_DEFAULTS, normalizeUnit, valueTemplate } from "./homeassistant-utils.js";

export { QUANTITY_DEFAULTS, normalizeUnit, valueTemplate } from "./homeassistant-utils.js";

export const DEFAULT_MODEL = "Raspberry Pi";
export const DEFAULT_MANUFACTURER = "Your Manufacturer";

export const ORIGIN = {
  name: "sensor2mqtt",
  sw_version: "1.0.0",
};

/**
 * Optional [DEVICE] section of the configuration.
 */
export interface DeviceSection {
  identifiers?: string;
  name?: string;
  model?: string;
  manufacturer?: string;
  sw_version?: string;
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the device block shared by all discovery messages of this host.
 * Identifiers are a comma-separated list; an empty list falls back to the
 * hostname.
 */
export function buildDeviceDescriptor(section: DeviceSection | undefined, hostname: string): DeviceDescriptor {
  const identifiers = (section?.identifiers ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  const swVersion = nonBlank(section?.sw_version);

  return Object.freeze({
    identifiers: Object.freeze(identifiers.length > 0 ? identifiers : [hostname]),
    name: nonBlank(section?.name) ?? hostname,
    model: nonBlank(section?.model) ?? DEFAULT_MODEL,
    manufacturer: nonBlank(section?.manufacturer) ?? DEFAULT_MANUFACTURER,
    ...(swVersion !== undefined ? { sw_version: swVersion } : {}),
  });
}

/**
 * Generate Home Assistant discovery payloads for the sensors of one host.
 */
export class HomeAssistantDiscovery {
  constructor(
    private readonly hostname: string,
    private readonly device: DeviceDescriptor,
  ) {}

  /**
   * One entry for a single-value sensor, one per quantity otherwise.
   * Unique ids only depend on the configuration, so republishing after a
   * restart updates the existing Home Assistant entities.
   */
  buildDiscoveryMessages(sensor: SensorConfig): DiscoveryEntry[] {
    const quantities: readonly Quantity[] = SENSOR_QUANTITIES[sensor.type];

    if (quantities.length === 1) {
      const [quantity] = quantities;
      return [
        this.entry(sensor, sensor.slug, {
          name: sensor.deviceName,
          quantity,
          uniqueId: sensor.uniqueId,
          deviceClass: sensor.deviceClass ?? QUANTITY_DEFAULTS[quantity].deviceClass,
        }),
      ];
    }

    return quantities.map((quantity) =>
      this.entry(sensor, `${sensor.slug}_${quantity}`, {
        name: `${sensor.deviceName} ${quantity}`,
        quantity,
        uniqueId: `${sensor.uniqueId}_${quantity}`,
        deviceClass: QUANTITY_DEFAULTS[quantity].deviceClass,
      }),
    );
  }

  discoveryTopic(discoveryPrefix: string, topicSuffix: string): string {
    return `${discoveryPrefix}/sensor/${this.hostname}/${topicSuffix}/config`;
  }

  private entry(
    sensor: SensorConfig,
    topicSuffix: string,
    options: { name: string; quantity: Quantity; uniqueId: string; deviceClass: string },
  ): DiscoveryEntry {
    const payload: DiscoveryMessage = {
      name: options.name,
      state_topic: sensor.stateTopic,
      unit_of_measurement: normalizeUnit(sensor.units[options.quantity]) ?? QUANTITY_DEFAULTS[options.quantity].unit,
      device_class: options.deviceClass,
      state_class: "measurement",
      value_template: valueTemplate(options.quantity),
      unique_id: options.uniqueId,
      device: this.device,
      origin: ORIGIN,
    };
    return {
      topicSuffix,
      topic: this.discoveryTopic(sensor.discoveryPrefix, topicSuffix),
      payload,
    };
  }
}

export function buildDiscoveryMessages(
  sensor: SensorConfig,
  device: DeviceDescriptor,
  hostname: string,
): DiscoveryEntry[] {
  return new HomeAssistantDiscovery(hostname, device).buildDiscoveryMessages(sensor);
}
