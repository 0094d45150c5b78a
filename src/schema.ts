import { z } from 'zod';

// monday.com serializes ids as strings, older API versions as numbers
const IdSchema = z.union([z.string().min(1), z.number().int()]).transform((id) => String(id));

export const BoardSchema = z.object({
  id: IdSchema,
  name: z.string()
});

export const ColumnSchema = z.object({
  id: z.string().min(1),
  title: z.string()
});

export const ColumnValueSchema = z.object({
  id: z.string().min(1),
  text: z.string().nullish().transform((text) => text ?? null)
});

export const ItemSchema = z.object({
  id: IdSchema,
  name: z.string(),
  column_values: z.array(ColumnValueSchema).default([])
});

export const ItemsPageSchema = z.object({
  cursor: z.string().nullish().transform((cursor) => cursor ?? null),
  items: z.array(ItemSchema)
});

export const GraphQlResponseSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
  // legacy error shape, still returned for some auth and complexity failures
  error_message: z.string().optional(),
  error_code: z.string().optional()
});

export const BoardsDataSchema = z.object({
  boards: z.array(BoardSchema)
});

export const BoardColumnsDataSchema = z.object({
  boards: z.array(z.object({ columns: z.array(ColumnSchema) }))
});

export const FirstItemsPageDataSchema = z.object({
  boards: z.array(z.object({ items_page: ItemsPageSchema }))
});

export const NextItemsPageDataSchema = z.object({
  next_items_page: ItemsPageSchema
});

const OptionalText = z.string().trim().min(1).optional();

export const EnvSchema = z.object({
  MONDAY_API_KEY: z.string({ required_error: 'MONDAY_API_KEY is required' }).trim().min(1, 'MONDAY_API_KEY is required'),
  GDRIVE_FOLDER_ID: z.string({ required_error: 'GDRIVE_FOLDER_ID is required' }).trim().min(1, 'GDRIVE_FOLDER_ID is required'),
  MONDAY_API_URL: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), 'MONDAY_API_URL must start with http:// or https://')
    .default('https://api.monday.com/v2'),
  MONDAY_API_VERSION: z.string().trim().min(1).default('2024-10'),
  MONDAY_BOARD_LIMIT: z.coerce.number().int().min(1).max(10000).default(500),
  MONDAY_PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(100),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  EXPORT_DIR: OptionalText,
  FAILED_EXPORT_POLICY: z.enum(['delete', 'retain']).default('delete'),
  FAILED_EXPORT_DIR: OptionalText
});
