/**
 * PacketStateMachine - Operator-side Packet Lifecycle
 *
 * Creation, artifact attachment, sale, reset and tombstone. Each transition
 * reads the packet, checks the lifecycle guard and commits through a single
 * version-guarded compare-and-set; a concurrent writer surfaces as
 * StaleStateError.
 *
 * Configuration (CONFIG_PENDING → CONFIG_DONE) belongs to the
 * ConfigurationApplier.
 *
 * @module services/PacketStateMachine
 */

import { createHash } from 'crypto';
import type { IArtifactValidator } from '../packages/core/ports/index.js';
import {
  PacketEvent,
  PacketState,
  type PacketListQuery,
  type PacketListResult,
  type PacketRecord,
  type StoredActivityEvent,
} from '../types/index.js';
import {
  DuplicateIdError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
  withRetry,
} from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { BasePacketService, type PacketServiceDeps } from './BasePacketService.js';
import type { IdentifierGenerator } from './identifiers.js';
import { nextState } from './packetLifecycle.js';

// =============================================================================
// Types
// =============================================================================

export const MIN_QR_COUNT = 1;
export const MAX_QR_COUNT = 100;

export interface CreatePacketInput {
  qrCount: number;
  listPrice?: number | null;
}

export interface ArtifactInput {
  bytes: Buffer;
  declaredType: string;
}

export interface SaleInput {
  buyerName: string;
  buyerEmail?: string | null;
  /** Falls back to the packet's list price */
  price?: number | null;
}

export interface PacketStateMachineDeps extends PacketServiceDeps {
  artifactValidator: IArtifactValidator;
  generateIds: IdentifierGenerator;
  /** Fresh-id attempts before a collision is surfaced */
  createMaxAttempts: number;
}

function assertPositivePrice(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive number`, field);
  }
}

// =============================================================================
// PacketStateMachine
// =============================================================================

export class PacketStateMachine extends BasePacketService {
  private readonly artifactValidator: IArtifactValidator;
  private readonly generateIds: IdentifierGenerator;
  private readonly createMaxAttempts: number;

  constructor(deps: PacketStateMachineDeps) {
    super(deps);
    this.artifactValidator = deps.artifactValidator;
    this.generateIds = deps.generateIds;
    this.createMaxAttempts = deps.createMaxAttempts;
  }

  /**
   * Create a packet in SETUP_PENDING with a fresh identifier pair.
   * Collisions are retried with new ids up to `createMaxAttempts` times.
   */
  async createPacket(input: CreatePacketInput, actor: string): Promise<PacketRecord> {
    if (
      !Number.isInteger(input.qrCount) ||
      input.qrCount < MIN_QR_COUNT ||
      input.qrCount > MAX_QR_COUNT
    ) {
      throw new ValidationError(
        `qrCount must be an integer between ${MIN_QR_COUNT} and ${MAX_QR_COUNT}`,
        'qrCount'
      );
    }
    const listPrice = input.listPrice ?? null;
    if (listPrice !== null) {
      assertPositivePrice(listPrice, 'listPrice');
    }

    let packet: PacketRecord;
    try {
      packet = await withRetry(
        () => {
          const ids = this.generateIds();
          return withTimeout(
            this.store.createAtomic({
              packetId: ids.packetId,
              managementId: ids.managementId,
              qrCount: input.qrCount,
              listPrice,
              createdAt: this.clock(),
            }),
            this.storeTimeoutMs,
            'createAtomic'
          );
        },
        {
          maxAttempts: this.createMaxAttempts,
          initialDelayMs: 0,
          shouldRetry: (error) => error instanceof DuplicateIdError,
        },
        'createPacket'
      );
    } catch (error) {
      if (error instanceof DuplicateIdError) {
        this.logger.error(
          { event: 'packet.id_exhausted', maxAttempts: this.createMaxAttempts },
          'Could not allocate unique packet identifiers'
        );
      }
      throw error;
    }

    this.logger.info(
      { event: 'packet.created', packetId: packet.packetId, qrCount: packet.qrCount, actor },
      'Packet created'
    );
    this.emitActivity({
      packetId: packet.packetId,
      eventType: 'packet_created',
      oldState: null,
      newState: packet.state,
      actor,
      timestamp: packet.createdAt,
      details: { qrCount: packet.qrCount, listPrice },
    });
    return packet;
  }

  /**
   * SETUP_PENDING → SETUP_DONE once the artifact passes validation
   */
  async attachArtifact(packetId: string, artifact: ArtifactInput, actor: string): Promise<PacketRecord> {
    const packet = await this.loadLivePacket(packetId, 'main');
    const to = this.guard(packet, PacketEvent.ARTIFACT_ATTACHED);

    const verdict = await this.artifactValidator.validateArtifact(artifact.bytes, artifact.declaredType);
    if (!verdict.ok) {
      throw new ValidationError(verdict.reason, 'artifact');
    }

    const record = {
      contentType: artifact.declaredType.toLowerCase(),
      sizeBytes: artifact.bytes.length,
      sha256: createHash('sha256').update(artifact.bytes).digest('hex'),
    };

    return this.commitTransition(
      packet,
      { state: to, artifact: record },
      { eventType: 'artifact_attached', actor, details: { ...record } }
    );
  }

  /**
   * SETUP_DONE → CONFIG_PENDING with buyer and price recorded
   */
  async markSold(packetId: string, sale: SaleInput, actor: string): Promise<PacketRecord> {
    const buyerName = sale.buyerName.trim();
    if (buyerName === '') {
      throw new ValidationError('buyerName is required', 'buyerName');
    }

    const packet = await this.loadLivePacket(packetId, 'main');
    const to = this.guard(packet, PacketEvent.MARKED_SOLD);

    const price = sale.price ?? packet.listPrice;
    if (price === null) {
      throw new ValidationError('price is required when the packet has no list price', 'price');
    }
    assertPositivePrice(price, 'price');

    const buyerEmail = sale.buyerEmail?.trim() || null;

    return this.commitTransition(
      packet,
      {
        state: to,
        sale: { buyerName, buyerEmail, price, soldAt: this.clock() },
      },
      {
        eventType: 'packet_sold',
        actor,
        details: { price, priceSource: sale.price != null ? 'sale' : 'list' },
      }
    );
  }

  /**
   * any → SETUP_PENDING. Clears target, sale and artifact; the management
   * update window is kept.
   */
  async reset(packetId: string, actor: string): Promise<PacketRecord> {
    const packet = await this.loadLivePacket(packetId, 'main');
    const to = this.guard(packet, PacketEvent.RESET);

    return this.commitTransition(
      packet,
      {
        state: to,
        redirectTarget: null,
        sale: null,
        artifact: null,
        lastConfiguredAt: null,
      },
      {
        eventType: 'packet_reset',
        actor,
        details: { hadTarget: packet.redirectTarget !== null },
      }
    );
  }

  /**
   * Soft delete. Identifiers stay reserved; both paths stop resolving.
   */
  async tombstone(packetId: string, actor: string): Promise<PacketRecord> {
    const packet = await this.loadLivePacket(packetId, 'main');
    return this.commitTransition(
      packet,
      { deletedAt: this.clock() },
      { eventType: 'packet_deleted', actor }
    );
  }

  async getPacket(packetId: string): Promise<PacketRecord> {
    return this.loadLivePacket(packetId, 'main');
  }

  async listPackets(query: PacketListQuery): Promise<PacketListResult> {
    return this.listLivePackets(query);
  }

  /**
   * Activity is kept for tombstoned packets too
   */
  async listActivity(packetId: string, limit?: number): Promise<StoredActivityEvent[]> {
    const packet = await this.findPacket(packetId, 'main');
    if (!packet) {
      throw new NotFoundError();
    }
    return withTimeout(
      this.activityLog.listForPacket(packet.packetId, limit),
      this.storeTimeoutMs,
      'listActivity'
    );
  }

  private guard(packet: PacketRecord, event: PacketEvent): PacketState {
    const to = nextState(packet.state, event);
    if (to === null) {
      throw new InvalidStateError(event, `Cannot apply ${event} to this packet`);
    }
    return to;
  }
}
