import { describeError, type Output } from './output.js';
import type { Item, ItemsPage, Row, SourceClient } from './types.js';

export const ITEM_ID_COLUMN = 'Item ID';
export const ITEM_NAME_COLUMN = 'Item Name';

export type ExportContext = {
  source: SourceClient;
  output: Output;
};

/**
 * One row per item, seeded with the item id and name. Column values are keyed by
 * the column title, or by the raw column id when the board has no such column.
 */
export function flattenItems(items: readonly Item[], columnTitles: ReadonlyMap<string, string>): Row[] {
  return items.map((item) => {
    const row: Row = new Map([
      [ITEM_ID_COLUMN, item.id],
      [ITEM_NAME_COLUMN, item.name]
    ]);
    for (const value of item.column_values) {
      row.set(columnTitles.get(value.id) ?? value.id, value.text ?? '');
    }
    return row;
  });
}

async function fetchColumnTitles(
  boardId: string,
  { source, output }: ExportContext
): Promise<ReadonlyMap<string, string> | null> {
  try {
    const columns = await source.fetchColumns(boardId);
    return new Map(columns.map((c) => [c.id, c.title] as const));
  } catch (error) {
    output.appendError(`Error fetching columns for board ${boardId}: ${describeError(error)}`);
    return null;
  }
}

/**
 * Fetches the board's columns, pages through all of its items and flattens them.
 *
 * Returns `null` when any request fails; items from pages fetched before the
 * failure are discarded. A board without items yields an empty array.
 */
export async function exportBoard(boardId: string, { source, output }: ExportContext): Promise<Row[] | null> {
  const columnTitles = await fetchColumnTitles(boardId, { source, output });
  if (!columnTitles) return null;

  const items: Item[] = [];
  let cursor: string | null = null;
  let pageNumber = 0;
  try {
    for (;;) {
      const page: ItemsPage = await source.fetchItemsPage(boardId, cursor);
      pageNumber++;
      if (page.items.length === 0) break;

      items.push(...page.items);
      output.appendLine(`Fetched page ${pageNumber} (${page.items.length} items).`);
      if (!page.cursor) break;
      cursor = page.cursor;
    }
  } catch (error) {
    output.appendError(`Error fetching items for board ${boardId} (page ${pageNumber + 1}): ${describeError(error)}`);
    return null;
  }

  output.appendLine(`Fetched ${items.length} items from board ${boardId}.`);
  return flattenItems(items, columnTitles);
}
