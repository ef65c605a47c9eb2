/**
 * ScanResolver - Dual-identifier Scan Resolution
 *
 * Maps (identifier, path) to a scan outcome. The path comes from the route
 * the scan arrived on. Resolution is read-only.
 *
 * @module services/ScanResolver
 */

import { PacketState, type PacketRecord, type ScanOutcome, type ScanPath } from '../types/index.js';
import { BasePacketService, type PacketServiceDeps } from './BasePacketService.js';
import { describeTarget, type DestinationRules } from './destination.js';
import { isWellFormedIdentifier } from './identifiers.js';
import { evaluateWindow, type UpdateWindowPolicy } from './updateWindow.js';

export interface ScanResolverDeps extends PacketServiceDeps {
  destinationRules: DestinationRules;
  updatePolicy: UpdateWindowPolicy;
}

export interface PacketStatus {
  state: PacketState;
  configured: boolean;
}

const NOT_READY: ScanOutcome = { kind: 'ERROR_NOT_READY' };

export class ScanResolver extends BasePacketService {
  private readonly destinationRules: DestinationRules;
  private readonly updatePolicy: UpdateWindowPolicy;

  constructor(deps: ScanResolverDeps) {
    super(deps);
    this.destinationRules = deps.destinationRules;
    this.updatePolicy = deps.updatePolicy;
  }

  async resolve(identifier: string, path: ScanPath): Promise<ScanOutcome> {
    const packet = await this.lookup(identifier, path);
    if (!packet) {
      return NOT_READY;
    }

    switch (packet.state) {
      case PacketState.SETUP_PENDING:
        return NOT_READY;

      case PacketState.SETUP_DONE:
        return { kind: 'PROMPT_CONFIGURE', path, acceptsSubmission: false };

      case PacketState.CONFIG_PENDING:
        return { kind: 'PROMPT_CONFIGURE', path, acceptsSubmission: true };

      case PacketState.CONFIG_DONE:
        return this.resolveConfigured(packet, path);
    }
  }

  /**
   * Public status probe; never exposes the target or the management id
   */
  async status(packetId: string): Promise<PacketStatus | null> {
    const packet = await this.lookup(packetId, 'main');
    if (!packet) {
      return null;
    }
    return { state: packet.state, configured: packet.state === PacketState.CONFIG_DONE };
  }

  private async lookup(identifier: string, path: ScanPath): Promise<PacketRecord | null> {
    if (!isWellFormedIdentifier(identifier, path)) {
      return null;
    }
    const packet = await this.findPacket(identifier, path);
    if (!packet || packet.deletedAt !== null) {
      return null;
    }
    return packet;
  }

  private resolveConfigured(packet: PacketRecord, path: ScanPath): ScanOutcome {
    const target = packet.redirectTarget;
    if (target === null) {
      this.logger.error(
        { event: 'scan.missing_target', packetId: packet.packetId },
        'Configured packet has no redirect target'
      );
      return NOT_READY;
    }

    if (path === 'main') {
      return { kind: 'REDIRECT', target };
    }

    const allowance = evaluateWindow(packet.updateWindow, this.clock(), this.updatePolicy);
    return {
      kind: 'PROMPT_RECONFIGURE',
      currentTarget: target,
      prefill: describeTarget(target, this.destinationRules),
      updatesRemaining: allowance.remaining,
      retryAfterSeconds: allowance.retryAfterSeconds,
    };
  }
}
