export type Board = {
  id: string;
  name: string;
};

export type Column = {
  id: string;
  title: string;
};

export type ColumnValue = {
  id: string;
  text: string | null;
};

export type Item = {
  id: string;
  name: string;
  column_values: ColumnValue[];
};

export type ItemsPage = {
  items: Item[];
  cursor: string | null; // null on the last page
};

// Keyed by column title (raw column id when the title is unknown), in first-seen order
export type Row = Map<string, string>;

export type UploadedFile = {
  id: string;
};

export type SourceClient = {
  listBoards(): Promise<Board[]>;
  fetchColumns(boardId: string): Promise<Column[]>;
  fetchItemsPage(boardId: string, cursor: string | null): Promise<ItemsPage>;
};

export type Uploader = {
  uploadFile(filePath: string, fileName: string): Promise<UploadedFile>;
};

export type FailedExportPolicy = 'delete' | 'retain';
