import type { DropPolicyName } from "@epg-link/schemas";
import type { DataFrame } from "./parser";

export interface BackpressureResult {
  kept: DataFrame[];
  dropped: number;
}

export interface BackpressurePolicy {
  readonly name: DropPolicyName;
  apply(frames: DataFrame[], maxBufferedMs: number): BackpressureResult;
}

/** Sheds from the front until the kept span fits. */
export const dropOldest: BackpressurePolicy = {
  name: "oldest",
  apply(frames, maxBufferedMs) {
    if (frames.length < 2) return { kept: frames, dropped: 0 };
    let lo = Number.POSITIVE_INFINITY;
    let hi = Number.NEGATIVE_INFINITY;
    let start = frames.length;
    for (let i = frames.length - 1; i >= 0; i -= 1) {
      const ts = frames[i].timestampMs;
      lo = Math.min(lo, ts);
      hi = Math.max(hi, ts);
      if (hi - lo > maxBufferedMs) break;
      start = i;
    }
    if (start === 0) return { kept: frames, dropped: 0 };
    return { kept: frames.slice(start), dropped: start };
  }
};

/** Sheds from the back until the kept span fits. */
export const dropNewest: BackpressurePolicy = {
  name: "newest",
  apply(frames, maxBufferedMs) {
    if (frames.length < 2) return { kept: frames, dropped: 0 };
    let lo = Number.POSITIVE_INFINITY;
    let hi = Number.NEGATIVE_INFINITY;
    let end = 0;
    for (let i = 0; i < frames.length; i += 1) {
      const ts = frames[i].timestampMs;
      lo = Math.min(lo, ts);
      hi = Math.max(hi, ts);
      if (hi - lo > maxBufferedMs) break;
      end = i + 1;
    }
    if (end === frames.length) return { kept: frames, dropped: 0 };
    return { kept: frames.slice(0, end), dropped: frames.length - end };
  }
};

/** Never sheds; notifications cannot be paused, so this only disables dropping. */
export const keepAll: BackpressurePolicy = {
  name: "block",
  apply(frames) {
    return { kept: frames, dropped: 0 };
  }
};

const POLICIES: Record<DropPolicyName, BackpressurePolicy> = {
  oldest: dropOldest,
  newest: dropNewest,
  block: keepAll
};

export function isDropPolicyName(name: string): name is DropPolicyName {
  return Object.prototype.hasOwnProperty.call(POLICIES, name);
}

export function resolveBackpressurePolicy(name: string): BackpressurePolicy | undefined {
  return isDropPolicyName(name) ? POLICIES[name] : undefined;
}
