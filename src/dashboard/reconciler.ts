/**
 * DashboardReconciler — converges a remote block document onto the desired
 * dashboard.
 *
 * Blocks are located by content: the header is the one heading block starting
 * with the title, each device's section is the one other block containing its
 * marker ("GPU 0:"). When every block is found exactly once, blocks are patched in
 * place. Otherwise everything except protected blocks is deleted and the
 * dashboard is written again as header, divider, then one block per device.
 *
 * A successful match or rebuild is cached as block ids so the next tick can
 * patch without fetching the document. Any failure drops the cache.
 *
 * Never throws: remote failures are collected into the result and the
 * dashboard stays stale until the next tick.
 */

import { ReconcileError, toError, type RemoteOperation } from '../core/errors.js';
import { getLogger, type Logger } from '../core/logger.js';
import {
  BLOCK_TYPES,
  DEFAULT_PROTECTED_TYPES,
  type BlockContent,
  type BlockMapping,
  type DashboardDocument,
  type DashboardSection,
  type MatchOutcome,
  type ReconcileResult,
  type RemoteBlock,
  type RemoteDocumentStore,
} from './types.js';
import { headerPrefix } from './model.js';

export interface ReconcilerOptions {
  documentId: string;
  store: RemoteDocumentStore;
  /** Block types that are never matched, patched or deleted */
  protectedTypes?: string[];
  logger?: Logger;
}

interface PatchTarget {
  id: string;
  content: BlockContent;
}

export class DashboardReconciler {
  private readonly documentId: string;
  private readonly store: RemoteDocumentStore;
  private readonly protectedTypes: Set<string>;
  private readonly logger: Logger;

  private cache: BlockMapping | null = null;

  constructor(options: ReconcilerOptions) {
    this.documentId = options.documentId;
    this.store = options.store;
    this.protectedTypes = new Set(options.protectedTypes ?? DEFAULT_PROTECTED_TYPES);
    this.logger = options.logger ?? getLogger().child({ component: 'reconciler' });
  }

  async reconcile(doc: DashboardDocument): Promise<ReconcileResult> {
    const sections = [...doc.sections].sort((a, b) => a.deviceId - b.deviceId);
    const result: ReconcileResult = {
      status: 'unchanged',
      patched: 0,
      skipped: 0,
      created: 0,
      deleted: 0,
      usedCache: false,
      errors: [],
    };

    const cached = this.cache;
    if (cached && cacheCovers(cached, sections)) {
      result.usedCache = true;
      await this.patchAll(this.targets(cached, doc, sections), result);
      return this.finishPatch(result, cached);
    }
    this.cache = null;

    let blocks: RemoteBlock[];
    try {
      blocks = await this.store.listChildBlocks(this.documentId);
    } catch (err) {
      const error = asReconcileError(err, 'list');
      this.logger.warn({ error: error.message }, 'Could not fetch dashboard blocks, rebuilding');
      return this.rebuild(doc, sections, result, 'initial fetch failed');
    }

    const candidates = blocks.filter((block) => !this.protectedTypes.has(block.type));
    if (candidates.length === 0) {
      return this.rebuild(doc, sections, result, 'document has no dashboard blocks', blocks);
    }

    const match = matchBlocks(candidates, doc.title, sections);
    if (!match.ok) {
      this.logger.info({ reason: match.reason }, 'Dashboard structure mismatch, rebuilding');
      return this.rebuild(doc, sections, result, match.reason, blocks);
    }

    const current = new Map(candidates.map((block) => [block.id, block.text]));
    await this.patchAll(this.targets(match.mapping, doc, sections), result, current);
    return this.finishPatch(result, match.mapping);
  }

  /** Forget cached block ids; the next reconcile fetches and matches again */
  invalidate(): void {
    this.cache = null;
  }

  hasCachedMapping(): boolean {
    return this.cache !== null;
  }

  // ─────────────────────────────────────────────────────────
  // PATCH PATH
  // ─────────────────────────────────────────────────────────

  private targets(mapping: BlockMapping, doc: DashboardDocument, sections: DashboardSection[]): PatchTarget[] {
    const targets: PatchTarget[] = [
      { id: mapping.header.id, content: { type: mapping.header.type, text: doc.header } },
    ];
    for (const section of sections) {
      const block = mapping.sections.get(section.deviceId);
      if (block) {
        targets.push({ id: block.id, content: { type: block.type, text: section.content } });
      }
    }
    return targets;
  }

  /**
   * Patch every target; one failure does not stop the rest.
   * With `current`, blocks already holding the desired text are left alone.
   */
  private async patchAll(
    targets: PatchTarget[],
    result: ReconcileResult,
    current?: Map<string, string>,
  ): Promise<void> {
    for (const target of targets) {
      if (current?.get(target.id) === target.content.text) {
        result.skipped++;
        continue;
      }
      try {
        await this.store.patchBlock(target.id, target.content);
        result.patched++;
      } catch (err) {
        const error = asReconcileError(err, 'patch', target.id);
        result.errors.push(error);
        this.logger.warn({ blockId: target.id, error: error.message }, 'Block patch failed');
      }
    }
  }

  private finishPatch(result: ReconcileResult, mapping: BlockMapping): ReconcileResult {
    if (result.errors.length > 0) {
      this.cache = null;
      result.status = 'failed';
    } else {
      this.cache = mapping;
      result.status = result.patched > 0 ? 'patched' : 'unchanged';
    }
    return result;
  }

  // ─────────────────────────────────────────────────────────
  // REBUILD PATH
  // ─────────────────────────────────────────────────────────

  private async rebuild(
    doc: DashboardDocument,
    sections: DashboardSection[],
    result: ReconcileResult,
    reason: string,
    fetched?: RemoteBlock[],
  ): Promise<ReconcileResult> {
    result.rebuildReason = reason;

    let blocks = fetched;
    if (!blocks) {
      try {
        blocks = await this.store.listChildBlocks(this.documentId);
      } catch (err) {
        // Appending without knowing what is there would duplicate the dashboard
        result.errors.push(asReconcileError(err, 'list'));
        result.status = 'failed';
        this.logger.warn({ error: toError(err).message }, 'Rebuild skipped, document unavailable');
        return result;
      }
    }

    for (const block of blocks) {
      if (this.protectedTypes.has(block.type)) {
        this.logger.debug({ blockId: block.id, type: block.type }, 'Preserving protected block');
        continue;
      }
      try {
        await this.store.deleteBlock(block.id);
        result.deleted++;
      } catch (err) {
        const error = asReconcileError(err, 'delete', block.id);
        result.errors.push(error);
        this.logger.warn({ blockId: block.id, error: error.message }, 'Block delete failed');
      }
    }

    const fresh: BlockContent[] = [
      { type: BLOCK_TYPES.header, text: doc.header },
      { type: BLOCK_TYPES.divider, text: '' },
      ...sections.map((section) => ({ type: BLOCK_TYPES.section, text: section.content })),
    ];

    try {
      const created = await this.store.appendChildBlocks(this.documentId, fresh);
      result.created = created.length;
      const match = matchBlocks(created, doc.title, sections);
      this.cache = match.ok && result.errors.length === 0 ? match.mapping : null;
    } catch (err) {
      const error = asReconcileError(err, 'append');
      result.errors.push(error);
      this.logger.warn({ error: error.message }, 'Dashboard append failed');
    }

    result.status = result.errors.length > 0 ? 'failed' : 'rebuilt';
    return result;
  }
}

// ═══════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════

/**
 * Locate the header and one distinct block per section. The header is the one
 * header-type block starting with "<title> - Updated:"; sections are searched
 * by marker among the remaining block types only, so a title that also occurs
 * in section text cannot be mistaken for it.
 * Zero or multiple candidates, or two sections landing on the same block,
 * is a mismatch.
 */
export function matchBlocks(blocks: RemoteBlock[], title: string, sections: DashboardSection[]): MatchOutcome {
  const prefix = headerPrefix(title);
  const headers = blocks.filter((block) => block.type === BLOCK_TYPES.header && block.text.startsWith(prefix));
  if (headers.length !== 1) {
    return { ok: false, reason: `expected one header block, found ${headers.length}` };
  }
  const bodies = blocks.filter((block) => block.type !== BLOCK_TYPES.header);

  const header = headers[0];
  const used = new Set<string>([header.id]);
  const mapped = new Map<number, { id: string; type: string }>();

  for (const section of sections) {
    const matches = bodies.filter((block) => block.text.includes(section.marker));
    if (matches.length !== 1) {
      return { ok: false, reason: `expected one block for "${section.marker}", found ${matches.length}` };
    }
    const block = matches[0];
    if (used.has(block.id)) {
      return { ok: false, reason: `block ${block.id} matches more than one section` };
    }
    used.add(block.id);
    mapped.set(section.deviceId, { id: block.id, type: block.type });
  }

  return {
    ok: true,
    mapping: { header: { id: header.id, type: header.type }, sections: mapped },
  };
}

function cacheCovers(mapping: BlockMapping, sections: DashboardSection[]): boolean {
  return (
    mapping.sections.size === sections.length &&
    sections.every((section) => mapping.sections.has(section.deviceId))
  );
}

function asReconcileError(err: unknown, operation: RemoteOperation, blockId?: string): ReconcileError {
  if (err instanceof ReconcileError) return err;
  const cause = toError(err);
  return new ReconcileError(`${operation} failed: ${cause.message}`, operation, blockId, undefined, cause);
}
