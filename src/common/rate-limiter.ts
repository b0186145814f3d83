/**
 * Outbound call throttling, one bottleneck per upstream service.
 */

import Bottleneck from 'bottleneck';

export type Upstream = 'CHAIN' | 'DATURA' | 'CHUTES';

// spacing in ms and parallel calls allowed per upstream
export const UPSTREAM_LIMITS = {
  CHAIN: { minTime: 50, maxConcurrent: 8 },
  DATURA: { minTime: 250, maxConcurrent: 2 },
  CHUTES: { minTime: 200, maxConcurrent: 2 },
} satisfies Record<Upstream, Bottleneck.ConstructorOptions>;

const throttles = new Map<Upstream, Bottleneck>();

function throttleFor(upstream: Upstream): Bottleneck {
  let throttle = throttles.get(upstream);
  if (!throttle) {
    throttle = new Bottleneck({ ...UPSTREAM_LIMITS[upstream] });
    throttles.set(upstream, throttle);
  }
  return throttle;
}

/** Runs `call` once the upstream's throttle lets it through. */
export function schedule<T>(upstream: Upstream, call: () => Promise<T>): Promise<T> {
  return throttleFor(upstream).schedule(call);
}
