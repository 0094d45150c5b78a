import { describeError, toError, type Output } from './output.js';
import type { Board, SourceClient } from './types.js';

// Distinguishes "the account has no boards" from "the boards query failed"
export type BoardListResult =
  | { ok: true; boards: Board[] }
  | { ok: false; error: Error };

export async function listBoards(source: SourceClient, output: Output): Promise<BoardListResult> {
  try {
    const boards = await source.listBoards();
    output.appendLine(`Found ${boards.length} boards.`);
    return { ok: true, boards };
  } catch (error) {
    output.appendError(`Error fetching boards: ${describeError(error)}`);
    return { ok: false, error: toError(error) };
  }
}
