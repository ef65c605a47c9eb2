/**
 * Admin API Routes
 *
 * Operator endpoints for the packet lifecycle:
 * - Packet creation (returns both scan URLs for printing)
 * - Artifact attachment, sale, reset and soft delete
 * - Listing and per-packet activity
 *
 * All routes require API key authentication; the key's name is recorded
 * as the actor on every activity event.
 */

import express, { Router } from 'express';
import type { NextFunction, Response } from 'express';
import { z } from 'zod';
import type { PacketCore } from '../../services/index.js';
import { PacketState, type PacketRecord } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseRequest, type AuthenticatedRequest } from '../middleware.js';

export interface AdminRouterOptions {
  publicBaseUrl: string;
  artifactMaxBytes: number;
}

// =============================================================================
// Schema Definitions
// =============================================================================

const createPacketSchema = z.object({
  qrCount: z.number().int().min(1).max(100),
  listPrice: z.number().positive().nullable().optional(),
});

const sellPacketSchema = z.object({
  buyerName: z.string().trim().min(1).max(200),
  buyerEmail: z.string().email().nullable().optional(),
  price: z.number().positive().nullable().optional(),
});

const listPacketsSchema = z.object({
  state: z.nativeEnum(PacketState).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const activityQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

// =============================================================================
// Serialization
// =============================================================================

function serializePacket(packet: PacketRecord) {
  return {
    packetId: packet.packetId,
    managementId: packet.managementId,
    qrCount: packet.qrCount,
    state: packet.state,
    version: packet.version,
    listPrice: packet.listPrice,
    redirectTarget: packet.redirectTarget,
    artifact: packet.artifact,
    sale: packet.sale
      ? {
          buyerName: packet.sale.buyerName,
          buyerEmail: packet.sale.buyerEmail,
          price: packet.sale.price,
          soldAt: packet.sale.soldAt.toISOString(),
        }
      : null,
    lastConfiguredAt: packet.lastConfiguredAt?.toISOString() ?? null,
    updateWindow: {
      count: packet.updateWindow.count,
      startedAt: packet.updateWindow.startedAt?.toISOString() ?? null,
    },
    createdAt: packet.createdAt.toISOString(),
    updatedAt: packet.updatedAt.toISOString(),
  };
}

function actorOf(req: AuthenticatedRequest): string {
  return req.adminName ?? 'admin';
}

function packetIdOf(req: AuthenticatedRequest): string {
  return req.params.packetId ?? '';
}

// =============================================================================
// Router
// =============================================================================

export function createAdminRouter(core: PacketCore, options: AdminRouterOptions): Router {
  const router = Router();
  const { stateMachine } = core;

  const scanUrls = (packet: PacketRecord) => ({
    main: `${options.publicBaseUrl}/p/${packet.packetId}`,
    management: `${options.publicBaseUrl}/m/${packet.managementId}`,
  });

  /**
   * POST /admin/packets
   * Create a packet and return the URLs to encode into its codes
   */
  router.post('/packets', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(createPacketSchema, req.body);
      const packet = await stateMachine.createPacket(
        { qrCount: body.qrCount, listPrice: body.listPrice ?? null },
        actorOf(req)
      );

      res.status(201).json({
        success: true,
        packet: serializePacket(packet),
        scanUrls: scanUrls(packet),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /admin/packets
   * Page live packets, newest first
   */
  router.get('/packets', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const query = parseRequest(listPacketsSchema, req.query);
      const result = await stateMachine.listPackets(query);

      res.json({
        packets: result.packets.map(serializePacket),
        total: result.total,
        hasMore: result.hasMore,
        limit: query.limit,
        offset: query.offset,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /admin/packets/:packetId
   */
  router.get('/packets/:packetId', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const packet = await stateMachine.getPacket(packetIdOf(req));
      res.json({ packet: serializePacket(packet), scanUrls: scanUrls(packet) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /admin/packets/:packetId/artifact
   * Raw image body; Content-Type is the declared artifact type
   */
  router.post(
    '/packets/:packetId/artifact',
    express.raw({ type: () => true, limit: options.artifactMaxBytes }),
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        const declaredType = req.headers['content-type']?.split(';')[0]?.trim() ?? '';
        if (declaredType === '') {
          throw new ValidationError('Content-Type header is required', 'artifact');
        }
        const bytes: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

        const packet = await stateMachine.attachArtifact(
          packetIdOf(req),
          { bytes, declaredType },
          actorOf(req)
        );
        res.json({ success: true, packet: serializePacket(packet) });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /admin/packets/:packetId/sell
   */
  router.post('/packets/:packetId/sell', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(sellPacketSchema, req.body);
      const packet = await stateMachine.markSold(
        packetIdOf(req),
        { buyerName: body.buyerName, buyerEmail: body.buyerEmail ?? null, price: body.price ?? null },
        actorOf(req)
      );
      res.json({ success: true, packet: serializePacket(packet) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /admin/packets/:packetId/reset
   */
  router.post('/packets/:packetId/reset', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const packet = await stateMachine.reset(packetIdOf(req), actorOf(req));
      logger.info({ packetId: packet.packetId, actor: actorOf(req) }, 'Admin reset packet');
      res.json({ success: true, packet: serializePacket(packet) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /admin/packets/:packetId
   * Soft delete; identifiers stay reserved
   */
  router.delete('/packets/:packetId', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const packet = await stateMachine.tombstone(packetIdOf(req), actorOf(req));
      logger.info({ packetId: packet.packetId, actor: actorOf(req) }, 'Admin deleted packet');
      res.json({ success: true, packetId: packet.packetId });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /admin/packets/:packetId/activity
   */
  router.get('/packets/:packetId/activity', async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    try {
      const query = parseRequest(activityQuerySchema, req.query);
      const events = await stateMachine.listActivity(packetIdOf(req), query.limit);

      res.json({
        events: events.map((event) => ({
          id: event.id,
          eventType: event.eventType,
          oldState: event.oldState,
          newState: event.newState,
          actor: event.actor,
          timestamp: event.timestamp.toISOString(),
          details: event.details ?? {},
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
