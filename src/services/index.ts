/**
 * Packet core composition
 *
 * Wires the three services over one set of ports. Policy values are
 * passed in here; nothing below this point reads configuration.
 */

import type { IActivityLog, IArtifactValidator, IPacketStore } from '../packages/core/ports/index.js';
import { createChildLogger, type Logger } from '../utils/logger.js';
import type { Clock } from './BasePacketService.js';
import { ConfigurationApplier } from './ConfigurationApplier.js';
import type { DestinationRules } from './destination.js';
import { generateIdentifierPair, type IdentifierGenerator } from './identifiers.js';
import { PacketStateMachine } from './PacketStateMachine.js';
import { ScanResolver } from './ScanResolver.js';

export interface PacketCoreOptions {
  managementUpdateCeiling: number;
  managementUpdateWindowMs: number;
  storeTimeoutMs: number;
  createMaxAttempts: number;
  destinationRules: DestinationRules;
}

export interface PacketCoreDeps {
  store: IPacketStore;
  activityLog: IActivityLog;
  artifactValidator: IArtifactValidator;
  options: PacketCoreOptions;
  logger?: Logger;
  clock?: Clock;
  generateIds?: IdentifierGenerator;
}

export interface PacketCore {
  stateMachine: PacketStateMachine;
  resolver: ScanResolver;
  applier: ConfigurationApplier;
}

export function createPacketCore(deps: PacketCoreDeps): PacketCore {
  const { options } = deps;
  const logger = deps.logger ?? createChildLogger({ component: 'packet-core' });
  const base = {
    store: deps.store,
    activityLog: deps.activityLog,
    logger,
    clock: deps.clock ?? (() => new Date()),
    storeTimeoutMs: options.storeTimeoutMs,
  };
  const updatePolicy = {
    ceiling: options.managementUpdateCeiling,
    windowMs: options.managementUpdateWindowMs,
  };

  return {
    stateMachine: new PacketStateMachine({
      ...base,
      artifactValidator: deps.artifactValidator,
      generateIds: deps.generateIds ?? (() => generateIdentifierPair()),
      createMaxAttempts: options.createMaxAttempts,
    }),
    resolver: new ScanResolver({
      ...base,
      destinationRules: options.destinationRules,
      updatePolicy,
    }),
    applier: new ConfigurationApplier({
      ...base,
      destinationRules: options.destinationRules,
      updatePolicy,
    }),
  };
}

export { PacketStateMachine, ScanResolver, ConfigurationApplier };
export type { ConfigurationResult } from './ConfigurationApplier.js';
export type { PacketStatus } from './ScanResolver.js';
