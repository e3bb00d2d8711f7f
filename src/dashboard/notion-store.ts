/**
 * NotionDocumentStore — RemoteDocumentStore over the Notion blocks API, plus
 * row creation in a Notion database for process history.
 *
 * Uses global fetch with a bounded timeout on every call. Responses are
 * validated with zod before use; anything unexpected surfaces as a
 * ReconcileError.
 */

import { z } from 'zod';
import { ReconcileError, toError, type RemoteOperation } from '../core/errors.js';
import type { BlockContent, DatabasePageWriter, RemoteBlock, RemoteDocumentStore } from './types.js';

/** Notion caps list pages and appended children at 100 */
const PAGE_SIZE = 100;

/** Notion rejects rich text objects longer than this */
const MAX_RICH_TEXT_LENGTH = 2000;

// ═══════════════════════════════════════════════════════════════
// DTOs
// ═══════════════════════════════════════════════════════════════

const RichTextSchema = z.object({
  plain_text: z.string().optional(),
  text: z.object({ content: z.string() }).optional(),
});

const TextBodySchema = z.object({
  rich_text: z.array(RichTextSchema),
});

const BlockSchema = z
  .object({
    id: z.string(),
    type: z.string(),
  })
  .passthrough();

const BlockListSchema = z.object({
  results: z.array(BlockSchema),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullable().optional(),
});

const PageSchema = z.object({ id: z.string() }).passthrough();

type NotionBlock = z.infer<typeof BlockSchema>;

export interface NotionStoreOptions {
  token: string;
  apiBaseUrl?: string;
  apiVersion?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class NotionDocumentStore implements RemoteDocumentStore, DatabasePageWriter {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: NotionStoreOptions) {
    this.baseUrl = (options.apiBaseUrl ?? 'https://api.notion.com/v1').replace(/\/+$/, '');
    this.headers = {
      'Authorization': `Bearer ${options.token}`,
      'Content-Type': 'application/json',
      'Notion-Version': options.apiVersion ?? '2022-06-28',
    };
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async listChildBlocks(documentId: string): Promise<RemoteBlock[]> {
    const blocks: RemoteBlock[] = [];
    let cursor: string | undefined;

    do {
      const query = new URLSearchParams({ page_size: String(PAGE_SIZE) });
      if (cursor) query.set('start_cursor', cursor);

      const page = this.parse(
        BlockListSchema,
        await this.request('GET', `/blocks/${documentId}/children?${query.toString()}`, 'list'),
        'list',
      );
      blocks.push(...page.results.map(toRemoteBlock));
      cursor = page.has_more ? page.next_cursor ?? undefined : undefined;
    } while (cursor);

    return blocks;
  }

  async patchBlock(blockId: string, content: BlockContent): Promise<void> {
    await this.request('PATCH', `/blocks/${blockId}`, 'patch', blockId, {
      [content.type]: blockBody(content),
    });
  }

  async deleteBlock(blockId: string): Promise<void> {
    await this.request('DELETE', `/blocks/${blockId}`, 'delete', blockId);
  }

  async appendChildBlocks(documentId: string, blocks: BlockContent[]): Promise<RemoteBlock[]> {
    const created: RemoteBlock[] = [];

    for (let i = 0; i < blocks.length; i += PAGE_SIZE) {
      const children = blocks.slice(i, i + PAGE_SIZE).map((content) => ({
        object: 'block',
        type: content.type,
        [content.type]: blockBody(content),
      }));
      const response = this.parse(
        BlockListSchema,
        await this.request('PATCH', `/blocks/${documentId}/children`, 'append', undefined, { children }),
        'append',
      );
      created.push(...response.results.map(toRemoteBlock));
    }

    return created;
  }

  async createDatabasePage(databaseId: string, properties: Record<string, unknown>): Promise<string> {
    const page = this.parse(
      PageSchema,
      await this.request('POST', '/pages', 'create', undefined, {
        parent: { database_id: databaseId },
        properties,
      }),
      'create',
    );
    return page.id;
  }

  // ─── Internal ─────────────────────────────────────────────

  private async request(
    method: 'GET' | 'POST' | 'PATCH' | 'DELETE',
    path: string,
    operation: RemoteOperation,
    blockId?: string,
    body?: Record<string, unknown>,
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ReconcileError(
        `Notion ${operation} request failed: ${toError(err).message}`,
        operation,
        blockId,
        undefined,
        toError(err),
      );
    }

    if (!response.ok) {
      const detail = await readErrorMessage(response);
      throw new ReconcileError(
        `Notion API error: ${response.status} ${response.statusText}${detail ? ` (${detail})` : ''}`,
        operation,
        blockId,
        response.status,
      );
    }

    try {
      return await response.json();
    } catch (err) {
      throw new ReconcileError(`Notion ${operation} returned invalid JSON`, operation, blockId, response.status, toError(err));
    }
  }

  private parse<T extends z.ZodTypeAny>(schema: T, data: unknown, operation: RemoteOperation): z.infer<T> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ReconcileError(`Unexpected Notion ${operation} response: ${parsed.error.message}`, operation);
    }
    return parsed.data;
  }
}

// ─── Helpers ──────────────────────────────────────────────────

function blockBody(content: BlockContent): Record<string, unknown> {
  if (content.type === 'divider') {
    return {};
  }
  const body: Record<string, unknown> = { rich_text: toRichText(content.text) };
  if (content.type === 'code') {
    body.language = 'plain text';
  }
  return body;
}

export function toRichText(text: string): Array<{ type: 'text'; text: { content: string } }> {
  const segments: Array<{ type: 'text'; text: { content: string } }> = [];
  for (let i = 0; i < text.length; i += MAX_RICH_TEXT_LENGTH) {
    segments.push({ type: 'text', text: { content: text.slice(i, i + MAX_RICH_TEXT_LENGTH) } });
  }
  return segments;
}

/** Concatenate a block's rich text; blocks without text read as '' */
export function blockText(block: NotionBlock): string {
  const body = TextBodySchema.safeParse(block[block.type]);
  if (!body.success) return '';
  return body.data.rich_text.map((part) => part.plain_text ?? part.text?.content ?? '').join('');
}

function toRemoteBlock(block: NotionBlock): RemoteBlock {
  return { id: block.id, type: block.type, text: blockText(block) };
}

async function readErrorMessage(response: Response): Promise<string | undefined> {
  const body: unknown = await response.json().catch(() => undefined);
  const parsed = z.object({ message: z.string() }).safeParse(body);
  return parsed.success ? parsed.data.message : undefined;
}
