/**
 * ConfigurationApplier - Destination Commit
 *
 * Validates a submitted destination and commits it with the state change,
 * the configuration timestamp and (management path) the update-window
 * increment in one compare-and-set. The applier does not retry; a lost race
 * surfaces as StaleStateError.
 *
 * @module services/ConfigurationApplier
 */

import { PacketEvent, PacketState, type PacketRecord, type ScanPath } from '../types/index.js';
import { InvalidStateError, NotFoundError, RateLimitExceededError } from '../utils/errors.js';
import { BasePacketService, type PacketServiceDeps } from './BasePacketService.js';
import { normalizeDestination, type DestinationRules } from './destination.js';
import { isWellFormedIdentifier } from './identifiers.js';
import { configurationEvent } from './packetLifecycle.js';
import { evaluateWindow, recordUpdate, type UpdateWindowPolicy } from './updateWindow.js';

export interface ConfigurationApplierDeps extends PacketServiceDeps {
  destinationRules: DestinationRules;
  updatePolicy: UpdateWindowPolicy;
}

export interface ConfigurationResult {
  packet: PacketRecord;
  target: string;
  /** False when the submission matched the current target and nothing was written */
  changed: boolean;
}

export class ConfigurationApplier extends BasePacketService {
  private readonly destinationRules: DestinationRules;
  private readonly updatePolicy: UpdateWindowPolicy;

  constructor(deps: ConfigurationApplierDeps) {
    super(deps);
    this.destinationRules = deps.destinationRules;
    this.updatePolicy = deps.updatePolicy;
  }

  async apply(identifier: string, path: ScanPath, rawDestination: string): Promise<ConfigurationResult> {
    const destination = normalizeDestination(rawDestination, this.destinationRules);

    if (!isWellFormedIdentifier(identifier, path)) {
      throw new NotFoundError();
    }
    const packet = await this.loadLivePacket(identifier, path);
    const now = this.clock();

    // Re-submitting the current target is a no-op, so a retry after a
    // timed-out commit cannot spend a second update.
    if (
      path === 'management' &&
      packet.state === PacketState.CONFIG_DONE &&
      packet.redirectTarget === destination.target
    ) {
      return { packet, target: destination.target, changed: false };
    }

    if (path === 'management') {
      const allowance = evaluateWindow(packet.updateWindow, now, this.updatePolicy);
      if (allowance.retryAfterSeconds !== null) {
        this.logger.info(
          { event: 'packet.update_rate_limited', packetId: packet.packetId, used: allowance.used },
          'Management update rejected by rate limit'
        );
        throw new RateLimitExceededError(allowance.retryAfterSeconds);
      }
    }

    const event = configurationEvent(packet.state, path);
    if (event === null) {
      throw new InvalidStateError(path === 'main' ? PacketEvent.CONFIGURED : PacketEvent.RECONFIGURED);
    }

    const updated = await this.commitTransition(
      packet,
      {
        state: PacketState.CONFIG_DONE,
        redirectTarget: destination.target,
        lastConfiguredAt: now,
        ...(path === 'management'
          ? { updateWindow: recordUpdate(packet.updateWindow, now, this.updatePolicy) }
          : {}),
      },
      {
        eventType: event === PacketEvent.CONFIGURED ? 'packet_configured' : 'packet_reconfigured',
        actor: `${path}-path`,
        details: {
          path,
          kind: destination.kind,
          oldTarget: packet.redirectTarget,
          newTarget: destination.target,
        },
      }
    );

    return { packet: updated, target: destination.target, changed: true };
  }
}
