/**
 * SqlitePacketStore Tests
 *
 * Runs against in-memory SQLite with the real migrations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../../../src/db/connection.js';
import { SqlitePacketStore } from '../../../../src/packages/adapters/storage/SqlitePacketStore.js';
import { PacketState, type NewPacketRecord } from '../../../../src/types/index.js';
import { DuplicateIdError, NotFoundError, StaleStateError } from '../../../../src/utils/errors.js';

const CREATED_AT = new Date('2026-03-01T09:00:00.000Z');
const LATER = new Date('2026-03-01T10:00:00.000Z');

function newPacket(suffix: string, overrides: Partial<NewPacketRecord> = {}): NewPacketRecord {
  return {
    packetId: `P${suffix.padEnd(12, 'A')}`,
    managementId: `M${suffix.padEnd(24, 'B')}`,
    qrCount: 25,
    listPrice: null,
    createdAt: CREATED_AT,
    ...overrides,
  };
}

describe('SqlitePacketStore', () => {
  let db: Database.Database;
  let store: SqlitePacketStore;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    store = new SqlitePacketStore(db);
  });

  afterEach(() => {
    db.close();
  });

  // ===========================================================================
  // createAtomic
  // ===========================================================================

  describe('createAtomic', () => {
    it('should insert a packet in SETUP_PENDING at version 1', async () => {
      const packet = await store.createAtomic(newPacket('C', { listPrice: 499 }));

      expect(packet).toEqual({
        packetId: 'PCAAAAAAAAAAA',
        managementId: 'MCBBBBBBBBBBBBBBBBBBBBBBB',
        qrCount: 25,
        state: PacketState.SETUP_PENDING,
        version: 1,
        listPrice: 499,
        redirectTarget: null,
        artifact: null,
        sale: null,
        lastConfiguredAt: null,
        updateWindow: { count: 0, startedAt: null },
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        deletedAt: null,
      });
    });

    it('should reject a reused packet id', async () => {
      await store.createAtomic(newPacket('C'));

      await expect(
        store.createAtomic(newPacket('C', { managementId: 'MZZZZZZZZZZZZZZZZZZZZZZZZ' }))
      ).rejects.toBeInstanceOf(DuplicateIdError);
    });

    it('should keep the two id spaces disjoint', async () => {
      const first = await store.createAtomic(newPacket('C'));

      // New public id, but its management id is the first packet's public id
      await expect(
        store.createAtomic(newPacket('D', { managementId: first.packetId }))
      ).rejects.toBeInstanceOf(DuplicateIdError);

      // Nothing from the failed insert is left behind
      expect(await store.get('PDAAAAAAAAAAA', 'main')).toBeNull();
      const count = db.prepare('SELECT COUNT(*) as count FROM packet_identifiers').get() as { count: number };
      expect(count.count).toBe(2);
    });
  });

  // ===========================================================================
  // get
  // ===========================================================================

  describe('get', () => {
    it('should resolve both identifiers to the same record', async () => {
      const created = await store.createAtomic(newPacket('C'));

      const byMain = await store.get(created.packetId, 'main');
      const byManagement = await store.get(created.managementId, 'management');

      expect(byMain).toEqual(created);
      expect(byManagement).toEqual(created);
    });

    it('should only look up an identifier on its own path', async () => {
      const created = await store.createAtomic(newPacket('C'));

      expect(await store.get(created.packetId, 'management')).toBeNull();
      expect(await store.get(created.managementId, 'main')).toBeNull();
    });
  });

  // ===========================================================================
  // compareAndSet
  // ===========================================================================

  describe('compareAndSet', () => {
    it('should apply the mutation and bump the version', async () => {
      const created = await store.createAtomic(newPacket('C'));

      const updated = await store.compareAndSet(created.packetId, 1, {
        state: PacketState.SETUP_DONE,
        artifact: { contentType: 'image/png', sizeBytes: 10, sha256: 'abc' },
        updatedAt: LATER,
      });

      expect(updated.version).toBe(2);
      expect(updated.state).toBe(PacketState.SETUP_DONE);
      expect(updated.artifact).toEqual({ contentType: 'image/png', sizeBytes: 10, sha256: 'abc' });
      expect(updated.updatedAt).toEqual(LATER);
    });

    it('should write every field of a multi-field transition together', async () => {
      const created = await store.createAtomic(newPacket('C'));
      await store.compareAndSet(created.packetId, 1, { state: PacketState.SETUP_DONE, updatedAt: LATER });
      await store.compareAndSet(created.packetId, 2, {
        state: PacketState.CONFIG_PENDING,
        sale: { buyerName: 'Asha', buyerEmail: null, price: 500, soldAt: LATER },
        updatedAt: LATER,
      });

      const configured = await store.compareAndSet(created.packetId, 3, {
        state: PacketState.CONFIG_DONE,
        redirectTarget: 'https://example.com/',
        lastConfiguredAt: LATER,
        updateWindow: { count: 1, startedAt: LATER },
        updatedAt: LATER,
      });

      expect(configured).toMatchObject({
        state: PacketState.CONFIG_DONE,
        version: 4,
        redirectTarget: 'https://example.com/',
        lastConfiguredAt: LATER,
        updateWindow: { count: 1, startedAt: LATER },
        sale: { buyerName: 'Asha', buyerEmail: null, price: 500, soldAt: LATER },
      });
    });

    it('should fail with StaleStateError when the version moved on', async () => {
      const created = await store.createAtomic(newPacket('C'));
      await store.compareAndSet(created.packetId, 1, { state: PacketState.SETUP_DONE, updatedAt: LATER });

      await expect(
        store.compareAndSet(created.packetId, 1, { state: PacketState.SETUP_DONE, updatedAt: LATER })
      ).rejects.toBeInstanceOf(StaleStateError);

      const current = await store.get(created.packetId, 'main');
      expect(current?.version).toBe(2);
    });

    it('should fail with NotFoundError for missing or tombstoned packets', async () => {
      await expect(
        store.compareAndSet('PNOPENOPENOPE', 1, { updatedAt: LATER })
      ).rejects.toBeInstanceOf(NotFoundError);

      const created = await store.createAtomic(newPacket('C'));
      await store.compareAndSet(created.packetId, 1, { deletedAt: LATER, updatedAt: LATER });

      await expect(
        store.compareAndSet(created.packetId, 2, { state: PacketState.SETUP_DONE, updatedAt: LATER })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should refuse a state that contradicts the stored fields', async () => {
      const created = await store.createAtomic(newPacket('C'));

      // CONFIG_DONE without a target or sale
      await expect(
        store.compareAndSet(created.packetId, 1, { state: PacketState.CONFIG_DONE, updatedAt: LATER })
      ).rejects.toThrow(/CHECK constraint failed/);
      expect((await store.get(created.packetId, 'main'))?.state).toBe(PacketState.SETUP_PENDING);
    });
  });

  // ===========================================================================
  // list
  // ===========================================================================

  describe('list', () => {
    it('should page live packets newest first', async () => {
      await store.createAtomic(newPacket('C'));
      await store.createAtomic(newPacket('D'));
      await store.createAtomic(newPacket('E'));

      const firstPage = await store.list({ limit: 2 });
      expect(firstPage.packets.map((p) => p.packetId)).toEqual(['PEAAAAAAAAAAA', 'PDAAAAAAAAAAA']);
      expect(firstPage.total).toBe(3);
      expect(firstPage.hasMore).toBe(true);

      const secondPage = await store.list({ limit: 2, offset: 2 });
      expect(secondPage.packets.map((p) => p.packetId)).toEqual(['PCAAAAAAAAAAA']);
      expect(secondPage.hasMore).toBe(false);
    });

    it('should hide tombstoned packets and filter by state', async () => {
      const c = await store.createAtomic(newPacket('C'));
      const d = await store.createAtomic(newPacket('D'));
      await store.createAtomic(newPacket('E'));
      await store.compareAndSet(c.packetId, 1, { deletedAt: LATER, updatedAt: LATER });
      await store.compareAndSet(d.packetId, 1, { state: PacketState.SETUP_DONE, updatedAt: LATER });

      const all = await store.list({});
      expect(all.packets.map((p) => p.packetId)).toEqual(['PEAAAAAAAAAAA', 'PDAAAAAAAAAAA']);

      const setupDone = await store.list({ state: PacketState.SETUP_DONE });
      expect(setupDone.packets.map((p) => p.packetId)).toEqual(['PDAAAAAAAAAAA']);
      expect(setupDone.total).toBe(1);
    });
  });
});
