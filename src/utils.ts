import lodash from "lodash";
const { deburr } = lodash;

/**
 * Resolves after `ms` milliseconds, or as soon as `signal` is aborted.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type RaceResult<T> = { settled: true; value: T } | { settled: false };

/**
 * Waits for `promise` unless `signal` is aborted first. A promise that loses
 * the race keeps running; a later rejection of it is ignored.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<RaceResult<T>> {
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve({ settled: false });
    promise.then(
      (value) => {
        signal?.removeEventListener("abort", onAbort);
        resolve({ settled: true, value });
      },
      (err: unknown) => {
        signal?.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export const SLUG_PLACEHOLDER = "sensor";

/**
 * Turn a display name into an MQTT topic segment: accents are folded to
 * their ASCII base letters, anything else outside [a-z0-9_] becomes a single
 * underscore. Never returns an empty string.
 */
export function slugify(name: string): string {
  const slug = deburr(name)
    .replace(/[^\u0000-\u007f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug.length > 0 ? slug : SLUG_PLACEHOLDER;
}
