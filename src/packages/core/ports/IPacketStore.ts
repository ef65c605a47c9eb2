/**
 * Packet Store Port
 *
 * Transactional accessor over the durable packet store. A packet is one
 * record reachable through two independent unique lookups: its public
 * packet id and its secret management id.
 *
 * @module packages/core/ports/IPacketStore
 */

import type {
  NewPacketRecord,
  PacketListQuery,
  PacketListResult,
  PacketMutation,
  PacketRecord,
  ScanPath,
} from '../../../types/index.js';

export interface IPacketStore {
  /**
   * Look up a packet by the identifier of the given path.
   * Returns tombstoned records as well; callers decide how to treat them.
   */
  get(identifier: string, path: ScanPath): Promise<PacketRecord | null>;

  /**
   * Insert a new packet in SETUP_PENDING at version 1.
   * @throws DuplicateIdError when either identifier is already taken in
   *         either id space
   */
  createAtomic(record: NewPacketRecord): Promise<PacketRecord>;

  /**
   * Apply `mutation` if the stored version still equals `expectedVersion`,
   * bumping the version in the same transaction.
   * @throws StaleStateError when the version moved on
   * @throws NotFoundError when the packet is missing or tombstoned
   */
  compareAndSet(
    packetId: string,
    expectedVersion: number,
    mutation: PacketMutation
  ): Promise<PacketRecord>;

  /**
   * Page live (non-tombstoned) packets, newest first
   */
  list(query: PacketListQuery): Promise<PacketListResult>;
}
