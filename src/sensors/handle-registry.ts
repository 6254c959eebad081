import { sleep } from "../utils.js";

/**
 * Process-wide cache of driver handles, one per key (a GPIO pin for DHT22).
 *
 * A handle is opened on first use and given `settleMs` before it is handed
 * out. Callers evict a handle after a failed sample so that the next
 * acquire starts from a fresh one.
 */
export class DriverHandleRegistry<K, H> {
  private readonly handles = new Map<K, H>();

  constructor(
    private readonly openHandle: (key: K) => Promise<H>,
    private readonly settleMs: number,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  async acquire(key: K): Promise<H> {
    const existing = this.handles.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const handle = await this.openHandle(key);
    await this.wait(this.settleMs);
    this.handles.set(key, handle);
    return handle;
  }

  /**
   * @returns whether a handle was cached for the key
   */
  evict(key: K): boolean {
    return this.handles.delete(key);
  }

  has(key: K): boolean {
    return this.handles.has(key);
  }

  get size(): number {
    return this.handles.size;
  }
}
