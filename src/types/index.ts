/**
 * Domain types for packets, scans and the activity log.
 */

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Packet lifecycle states.
 *
 * State flow:
 *   SETUP_PENDING → SETUP_DONE → CONFIG_PENDING → CONFIG_DONE ⟲
 *
 * There is no terminal state: CONFIG_DONE may be reconfigured indefinitely
 * through the management path, and an operator reset returns any state to
 * SETUP_PENDING.
 */
export enum PacketState {
  /** Created, no printed artifact attached yet */
  SETUP_PENDING = 'SETUP_PENDING',
  /** Artifact attached, on sale */
  SETUP_DONE = 'SETUP_DONE',
  /** Sold, waiting for the buyer's first destination */
  CONFIG_PENDING = 'CONFIG_PENDING',
  /** Destination set, scans redirect */
  CONFIG_DONE = 'CONFIG_DONE',
}

/**
 * Lifecycle events that drive transitions
 */
export enum PacketEvent {
  ARTIFACT_ATTACHED = 'ARTIFACT_ATTACHED',
  MARKED_SOLD = 'MARKED_SOLD',
  CONFIGURED = 'CONFIGURED',
  RECONFIGURED = 'RECONFIGURED',
  RESET = 'RESET',
}

/**
 * Which URL namespace an identifier arrived on.
 * Classification comes from the route, never from the identifier's content.
 */
export type ScanPath = 'main' | 'management';

// =============================================================================
// Packet record
// =============================================================================

export interface SaleRecord {
  buyerName: string;
  buyerEmail: string | null;
  price: number;
  soldAt: Date;
}

export interface ArtifactRecord {
  contentType: string;
  sizeBytes: number;
  sha256: string;
}

/**
 * Rolling management-update window, embedded in the packet record
 */
export interface UpdateWindow {
  count: number;
  startedAt: Date | null;
}

export interface PacketRecord {
  packetId: string;
  managementId: string;
  qrCount: number;
  state: PacketState;
  /** Monotonic version, bumped on every committed write */
  version: number;
  listPrice: number | null;
  redirectTarget: string | null;
  artifact: ArtifactRecord | null;
  sale: SaleRecord | null;
  lastConfiguredAt: Date | null;
  updateWindow: UpdateWindow;
  createdAt: Date;
  updatedAt: Date;
  /** Soft-delete tombstone */
  deletedAt: Date | null;
}

/**
 * Fields supplied when a packet row is first inserted
 */
export interface NewPacketRecord {
  packetId: string;
  managementId: string;
  qrCount: number;
  listPrice: number | null;
  createdAt: Date;
}

/**
 * Fields a compare-and-set may write. Omitted keys are left unchanged;
 * `null` clears a nullable field.
 */
export interface PacketMutation {
  state?: PacketState;
  redirectTarget?: string | null;
  artifact?: ArtifactRecord | null;
  sale?: SaleRecord | null;
  lastConfiguredAt?: Date | null;
  updateWindow?: UpdateWindow;
  deletedAt?: Date | null;
  updatedAt: Date;
}

export interface PacketListQuery {
  state?: PacketState;
  limit?: number;
  offset?: number;
}

export interface PacketListResult {
  packets: PacketRecord[];
  total: number;
  hasMore: boolean;
}

// =============================================================================
// Scan outcomes
// =============================================================================

/**
 * Destination split back into the form fields that produced it
 */
export type DestinationPrefill =
  | { kind: 'contact'; phoneNumber: string }
  | { kind: 'url'; url: string };

export type ScanOutcome =
  | { kind: 'ERROR_NOT_READY' }
  | {
      kind: 'PROMPT_CONFIGURE';
      path: ScanPath;
      /** False while the packet is on sale but not yet sold */
      acceptsSubmission: boolean;
    }
  | {
      kind: 'PROMPT_RECONFIGURE';
      currentTarget: string;
      prefill: DestinationPrefill;
      updatesRemaining: number;
      /** Seconds until another update is accepted; null when one is allowed now */
      retryAfterSeconds: number | null;
    }
  | { kind: 'REDIRECT'; target: string };

// =============================================================================
// Activity log
// =============================================================================

export type ActivityEventType =
  | 'packet_created'
  | 'artifact_attached'
  | 'packet_sold'
  | 'packet_configured'
  | 'packet_reconfigured'
  | 'packet_reset'
  | 'packet_deleted';

export interface ActivityEvent {
  packetId: string;
  eventType: ActivityEventType;
  oldState: PacketState | null;
  newState: PacketState;
  /** Operator name, or `main-path` / `management-path` for customer actions */
  actor: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export interface StoredActivityEvent extends ActivityEvent {
  id: string;
}
