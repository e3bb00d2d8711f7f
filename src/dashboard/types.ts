/**
 * Dashboard Types
 *
 * The desired document is rebuilt from scratch every tick. Remote blocks are
 * owned by the document service; the reconciler only keeps a rebuildable cache
 * of which block shows what.
 */

import type { ReconcileError } from '../core/errors.js';

// ═══════════════════════════════════════════════════════════════
// DESIRED MODEL
// ═══════════════════════════════════════════════════════════════

export interface DashboardSection {
  deviceId: number;
  /** Substring that identifies this device's block, e.g. "GPU 0:" */
  marker: string;
  /** Full multi-line text of the section block */
  content: string;
}

export interface DashboardDocument {
  /** Marker that identifies the header block */
  title: string;
  /** Full header text: title plus last-updated timestamp */
  header: string;
  generatedAt: string;
  /** Ordered by device id ascending */
  sections: DashboardSection[];
}

// ═══════════════════════════════════════════════════════════════
// REMOTE DOCUMENT
// ═══════════════════════════════════════════════════════════════

export interface RemoteBlock {
  id: string;
  /** Opaque type tag from the document service */
  type: string;
  /** Plain text of the block; empty for blocks without text */
  text: string;
}

export interface BlockContent {
  type: string;
  text: string;
}

export interface RemoteDocumentStore {
  listChildBlocks(documentId: string): Promise<RemoteBlock[]>;
  /** Replace the whole text of a block */
  patchBlock(blockId: string, content: BlockContent): Promise<void>;
  deleteBlock(blockId: string): Promise<void>;
  /** Append blocks in order and return them as created */
  appendChildBlocks(documentId: string, blocks: BlockContent[]): Promise<RemoteBlock[]>;
}

/** Writes rows into a remote database; returns the new row's id */
export interface DatabasePageWriter {
  createDatabasePage(databaseId: string, properties: Record<string, unknown>): Promise<string>;
}

/** Block types written on rebuild */
export const BLOCK_TYPES = {
  header: 'heading_2',
  divider: 'divider',
  section: 'code',
} as const;

export const DEFAULT_PROTECTED_TYPES = ['child_page', 'child_database'];

// ═══════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════

/** Ordered from best to worst */
export type ReconcileStatus = 'unchanged' | 'patched' | 'rebuilt' | 'failed';

export interface ReconcileResult {
  status: ReconcileStatus;
  patched: number;
  /** Matched blocks that already held the desired text */
  skipped: number;
  created: number;
  deleted: number;
  usedCache: boolean;
  /** Why a rebuild was chosen, when it was */
  rebuildReason?: string;
  errors: ReconcileError[];
}

export interface MatchedBlock {
  id: string;
  type: string;
}

export interface BlockMapping {
  header: MatchedBlock;
  sections: Map<number, MatchedBlock>;
}

export type MatchOutcome =
  | { ok: true; mapping: BlockMapping }
  | { ok: false; reason: string };

export interface PublishResult {
  published: number;
  /** Sessions already published earlier, or not yet ended when only ended ones are wanted */
  skipped: number;
  failed: number;
  errors: ReconcileError[];
}
