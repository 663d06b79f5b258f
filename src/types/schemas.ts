import { z } from "zod";

export const tickerParamsSchema = z.object({
  ticker: z.string().min(1).max(64)
});

// pg hands back BIGINT and NUMERIC columns as strings.
const integerColumn = z
  .union([z.number(), z.string().regex(/^-?\d+$/)])
  .pipe(z.coerce.number().int())
  .refine(Number.isSafeInteger, "integer outside the safe range");
const decimalColumn = z
  .union([z.number(), z.string().regex(/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/)])
  .pipe(z.coerce.number().finite())
  .nullable();
const timestampColumn = z.union([z.date(), z.string().datetime({ offset: true })]).pipe(z.coerce.date());
const textColumn = z.string().nullable();

export const stockRowSchema = z.object({
  id: integerColumn,
  ticker: z.string(),
  name: z.string()
});

export const stockIdRowSchema = z.object({
  id: integerColumn
});

export const predictionRowSchema = z.object({
  id: integerColumn,
  stock_id: integerColumn,
  message_id: z
    .union([z.string(), z.number()])
    .nullable()
    .transform((value) => (value === null ? null : String(value))),
  prediction_type: textColumn,
  target_price: decimalColumn,
  target_change_percent: decimalColumn,
  period: textColumn,
  recommendation: textColumn,
  direction: textColumn,
  justification_text: textColumn,
  message_text: textColumn,
  predicted_at: timestampColumn
});

export type StockRow = z.infer<typeof stockRowSchema>;
export type PredictionRow = z.infer<typeof predictionRowSchema>;
