/**
 * Management-update window
 *
 * The counter lives on the packet record and is interpreted against the
 * clock at read time: once the window has elapsed the stored count no
 * longer applies. Nothing sweeps it in the background.
 */

import type { UpdateWindow } from '../types/index.js';

export interface UpdateWindowPolicy {
  /** Accepted management updates per window */
  ceiling: number;
  windowMs: number;
}

export interface UpdateAllowance {
  /** Updates already accepted in the live window */
  used: number;
  remaining: number;
  /** Seconds until the window rolls over; null when an update is allowed now */
  retryAfterSeconds: number | null;
}

function isLive(window: UpdateWindow, now: Date, policy: UpdateWindowPolicy): window is UpdateWindow & { startedAt: Date } {
  return window.startedAt !== null && now.getTime() - window.startedAt.getTime() < policy.windowMs;
}

export function evaluateWindow(
  window: UpdateWindow,
  now: Date,
  policy: UpdateWindowPolicy
): UpdateAllowance {
  if (!isLive(window, now, policy)) {
    return { used: 0, remaining: policy.ceiling, retryAfterSeconds: null };
  }

  const used = window.count;
  const remaining = Math.max(policy.ceiling - used, 0);
  if (remaining > 0) {
    return { used, remaining, retryAfterSeconds: null };
  }

  const resetsAt = window.startedAt.getTime() + policy.windowMs;
  return {
    used,
    remaining,
    retryAfterSeconds: Math.max(Math.ceil((resetsAt - now.getTime()) / 1000), 1),
  };
}

/**
 * Window after one more accepted update. Starts a fresh window when the
 * stored one has elapsed.
 */
export function recordUpdate(
  window: UpdateWindow,
  now: Date,
  policy: UpdateWindowPolicy
): UpdateWindow {
  if (!isLive(window, now, policy)) {
    return { count: 1, startedAt: now };
  }
  return { count: window.count + 1, startedAt: window.startedAt };
}
