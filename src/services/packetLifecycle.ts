/**
 * Packet lifecycle transition table
 *
 * States: SETUP_PENDING → SETUP_DONE → CONFIG_PENDING → CONFIG_DONE ⟲
 *         any → SETUP_PENDING (operator reset)
 *
 * The guard for every event is that the current state is exactly one of
 * the listed origins; no skipping.
 */

import { PacketEvent, PacketState } from '../types/index.js';

const ALL_STATES: readonly PacketState[] = [
  PacketState.SETUP_PENDING,
  PacketState.SETUP_DONE,
  PacketState.CONFIG_PENDING,
  PacketState.CONFIG_DONE,
];

interface TransitionRule {
  from: readonly PacketState[];
  to: PacketState;
}

const TRANSITIONS: Record<PacketEvent, TransitionRule> = {
  [PacketEvent.ARTIFACT_ATTACHED]: {
    from: [PacketState.SETUP_PENDING],
    to: PacketState.SETUP_DONE,
  },
  [PacketEvent.MARKED_SOLD]: {
    from: [PacketState.SETUP_DONE],
    to: PacketState.CONFIG_PENDING,
  },
  [PacketEvent.CONFIGURED]: {
    from: [PacketState.CONFIG_PENDING],
    to: PacketState.CONFIG_DONE,
  },
  [PacketEvent.RECONFIGURED]: {
    from: [PacketState.CONFIG_DONE],
    to: PacketState.CONFIG_DONE,
  },
  [PacketEvent.RESET]: {
    from: ALL_STATES,
    to: PacketState.SETUP_PENDING,
  },
};

export function canTransition(from: PacketState, event: PacketEvent): boolean {
  return TRANSITIONS[event].from.includes(from);
}

/**
 * Target state for `event`, or null when the current state does not permit it
 */
export function nextState(from: PacketState, event: PacketEvent): PacketState | null {
  return canTransition(from, event) ? TRANSITIONS[event].to : null;
}

/**
 * Event a configuration submission fires from `from`, or null when the path
 * may not configure in that state. The main path configures exactly once;
 * the management path may also reconfigure.
 */
export function configurationEvent(
  from: PacketState,
  path: 'main' | 'management'
): PacketEvent | null {
  if (canTransition(from, PacketEvent.CONFIGURED)) {
    return PacketEvent.CONFIGURED;
  }
  if (path === 'management' && canTransition(from, PacketEvent.RECONFIGURED)) {
    return PacketEvent.RECONFIGURED;
  }
  return null;
}
