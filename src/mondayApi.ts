import type { z } from 'zod';
import {
  BoardColumnsDataSchema,
  BoardsDataSchema,
  FirstItemsPageDataSchema,
  GraphQlResponseSchema,
  NextItemsPageDataSchema
} from './schema.js';
import type { Board, Column, ItemsPage, SourceClient } from './types.js';

export type MondayClientOptions = {
  apiUrl: string;
  apiKey: string;
  apiVersion: string;
  boardLimit: number;
  pageSize: number;
  timeoutMs: number;
  fetch?: typeof fetch;
};

export class MondayApiError extends Error {
  readonly status?: number;
  readonly messages: string[];

  constructor(message: string, details: { status?: number; messages?: string[] } = {}) {
    super(message);
    this.name = 'MondayApiError';
    this.status = details.status;
    this.messages = details.messages ?? [];
  }
}

const ITEM_FIELDS = `
  cursor
  items {
    id
    name
    column_values {
      id
      text
    }
  }
`;

export const LIST_BOARDS_QUERY = `query ListBoards($limit: Int!) {
  boards(limit: $limit) {
    id
    name
  }
}`;

export const BOARD_COLUMNS_QUERY = `query BoardColumns($boardIds: [ID!]) {
  boards(ids: $boardIds) {
    columns {
      id
      title
    }
  }
}`;

export const FIRST_ITEMS_PAGE_QUERY = `query FirstItemsPage($boardIds: [ID!], $limit: Int!) {
  boards(ids: $boardIds) {
    items_page(limit: $limit) {${ITEM_FIELDS}}
  }
}`;

export const NEXT_ITEMS_PAGE_QUERY = `query NextItemsPage($cursor: String!, $limit: Int!) {
  next_items_page(cursor: $cursor, limit: $limit) {${ITEM_FIELDS}}
}`;

function normalizeApiUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');
  if (!/^https?:\/\//i.test(trimmed)) {
    throw new Error('MONDAY_API_URL must start with http:// or https:// (e.g. https://api.monday.com/v2)');
  }
  return trimmed;
}

function summarizeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function createMondayClient(options: MondayClientOptions): SourceClient {
  const apiUrl = normalizeApiUrl(options.apiUrl);
  const apiKey = options.apiKey.trim();
  if (!apiKey) throw new Error('MONDAY_API_KEY is required');
  const fetchImpl = options.fetch ?? fetch;

  async function request<T>(
    label: string,
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const res = await fetchImpl(apiUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: apiKey,
        'API-Version': options.apiVersion
      },
      body: JSON.stringify({ query, variables }),
      signal: AbortSignal.timeout(options.timeoutMs)
    });

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new MondayApiError(`monday.com ${label} failed (${res.status}): ${text || res.statusText}`, {
        status: res.status
      });
    }

    const envelope = GraphQlResponseSchema.safeParse(await res.json());
    if (!envelope.success) {
      throw new MondayApiError(`monday.com ${label} returned a malformed response: ${summarizeIssues(envelope.error)}`, {
        status: res.status
      });
    }

    const messages = [
      ...(envelope.data.errors ?? []).map((e) => e.message),
      ...(envelope.data.error_message ? [envelope.data.error_message] : [])
    ];
    if (messages.length > 0) {
      throw new MondayApiError(`monday.com ${label} returned errors: ${messages.join('; ')}`, {
        status: res.status,
        messages
      });
    }

    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      throw new MondayApiError(`monday.com ${label} returned unexpected data: ${summarizeIssues(data.error)}`, {
        status: res.status
      });
    }
    return data.data;
  }

  return {
    async listBoards(): Promise<Board[]> {
      const data = await request('boards query', LIST_BOARDS_QUERY, { limit: options.boardLimit }, BoardsDataSchema);
      return data.boards;
    },

    async fetchColumns(boardId: string): Promise<Column[]> {
      const data = await request('columns query', BOARD_COLUMNS_QUERY, { boardIds: [boardId] }, BoardColumnsDataSchema);
      const board = data.boards[0];
      if (!board) throw new MondayApiError(`Board ${boardId} not found or inaccessible`);
      return board.columns;
    },

    async fetchItemsPage(boardId: string, cursor: string | null): Promise<ItemsPage> {
      if (cursor) {
        const data = await request(
          'items page query',
          NEXT_ITEMS_PAGE_QUERY,
          { cursor, limit: options.pageSize },
          NextItemsPageDataSchema
        );
        return data.next_items_page;
      }

      const data = await request(
        'items page query',
        FIRST_ITEMS_PAGE_QUERY,
        { boardIds: [boardId], limit: options.pageSize },
        FirstItemsPageDataSchema
      );
      const board = data.boards[0];
      if (!board) throw new MondayApiError(`Board ${boardId} not found or inaccessible`);
      return board.items_page;
    }
  };
}
