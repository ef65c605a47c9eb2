/**
 * Shared plumbing for the packet services: bounded store access, the
 * compare-and-set commit and best-effort activity emission.
 */

import type { IActivityLog, IPacketStore } from '../packages/core/ports/index.js';
import type {
  ActivityEvent,
  ActivityEventType,
  PacketListQuery,
  PacketListResult,
  PacketMutation,
  PacketRecord,
  ScanPath,
} from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export type Clock = () => Date;

export interface PacketServiceDeps {
  store: IPacketStore;
  activityLog: IActivityLog;
  logger: Logger;
  clock: Clock;
  /** Upper bound for a single store call */
  storeTimeoutMs: number;
}

export interface TransitionAudit {
  eventType: ActivityEventType;
  actor: string;
  details?: Record<string, unknown>;
}

export abstract class BasePacketService {
  protected readonly store: IPacketStore;
  protected readonly activityLog: IActivityLog;
  protected readonly logger: Logger;
  protected readonly clock: Clock;
  protected readonly storeTimeoutMs: number;

  protected constructor(deps: PacketServiceDeps) {
    this.store = deps.store;
    this.activityLog = deps.activityLog;
    this.logger = deps.logger;
    this.clock = deps.clock;
    this.storeTimeoutMs = deps.storeTimeoutMs;
  }

  protected findPacket(identifier: string, path: ScanPath): Promise<PacketRecord | null> {
    return withTimeout(this.store.get(identifier, path), this.storeTimeoutMs, 'get');
  }

  /**
   * Load a live packet
   * @throws NotFoundError when missing or tombstoned
   */
  protected async loadLivePacket(identifier: string, path: ScanPath): Promise<PacketRecord> {
    const packet = await this.findPacket(identifier, path);
    if (!packet || packet.deletedAt !== null) {
      throw new NotFoundError();
    }
    return packet;
  }

  protected listLivePackets(query: PacketListQuery): Promise<PacketListResult> {
    return withTimeout(this.store.list(query), this.storeTimeoutMs, 'list');
  }

  /**
   * Write `mutation` against the version that was read, then emit the
   * activity event. The event is only emitted once the write committed.
   */
  protected async commitTransition(
    packet: PacketRecord,
    mutation: Omit<PacketMutation, 'updatedAt'>,
    audit: TransitionAudit
  ): Promise<PacketRecord> {
    const now = this.clock();
    const updated = await withTimeout(
      this.store.compareAndSet(packet.packetId, packet.version, { ...mutation, updatedAt: now }),
      this.storeTimeoutMs,
      'compareAndSet'
    );

    this.logger.info(
      {
        event: 'packet.transition',
        packetId: updated.packetId,
        eventType: audit.eventType,
        fromState: packet.state,
        toState: updated.state,
        version: updated.version,
        actor: audit.actor,
      },
      'Packet transition committed'
    );

    this.emitActivity({
      packetId: updated.packetId,
      eventType: audit.eventType,
      oldState: packet.state,
      newState: updated.state,
      actor: audit.actor,
      timestamp: now,
      details: audit.details,
    });

    return updated;
  }

  /**
   * Fire-and-forget; a failing activity log never fails the operation
   */
  protected emitActivity(event: ActivityEvent): void {
    void this.activityLog.record(event).catch((error: unknown) => {
      this.logger.warn(
        {
          event: 'activity.record_failed',
          packetId: event.packetId,
          eventType: event.eventType,
          error: error instanceof Error ? error.message : String(error),
        },
        'Failed to record packet activity'
      );
    });
  }
}
