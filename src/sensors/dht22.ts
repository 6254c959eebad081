import type { Dht22Config, Quantity } from "../models.js";
import { Sensor } from "./base.js";
import type { DhtHandle } from "./drivers.js";
import type { DriverHandleRegistry } from "./handle-registry.js";

/** Wait after initialising a pin before its first sample. */
export const DHT_SETTLE_MS = 2000;

export type DhtHandleRegistry = DriverHandleRegistry<number, DhtHandle>;

/**
 * Dual-value humidity/temperature sensor on a single-wire GPIO bus.
 * Handles are shared per pin through the injected registry; any failed read
 * evicts the pin so the next cycle re-initialises it.
 */
export class Dht22Sensor extends Sensor<Dht22Config> {
  protected readonly precision = 2;

  constructor(
    config: Dht22Config,
    private readonly handles: DhtHandleRegistry,
  ) {
    super(config);
  }

  protected async sample(): Promise<Partial<Record<Quantity, number>>> {
    const handle = await this.handles.acquire(this.config.pin);
    const { temperature, humidity } = await handle.sample();
    return { temperature, humidity };
  }

  protected onFailure(): void {
    this.handles.evict(this.config.pin);
  }
}
