/**
 * Core ports
 *
 * @module packages/core/ports
 */

export type { IPacketStore } from './IPacketStore.js';
export type { IArtifactValidator, ArtifactVerdict } from './IArtifactValidator.js';
export type { IActivityLog } from './IActivityLog.js';
