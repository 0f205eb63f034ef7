import { z } from 'zod';

/** Numbers arrive as strings on most fields. */
const num = z
  .union([z.number(), z.string().trim().min(1)])
  .transform((v) => Number(v))
  .pipe(z.number().finite());

const id = z.union([z.string().min(1), z.number()]).transform((v) => String(v));

const sideSchema = z.enum(['BUY', 'SELL']);

// ─── Envelope ────────────────────────────────────────────────────────────

export const envelopeSchema = z.object({
  status: z.number(),
  messages: z
    .array(
      z.object({
        message_code: z.string().optional(),
        message_string: z.string().optional(),
      }),
    )
    .optional(),
  data: z.unknown().optional(),
  responsetime: z.string().optional(),
});

// `data` is sometimes a list and sometimes one object for the same logical
// field. Each payload schema below accepts both and yields one shape.

// ─── Payloads ────────────────────────────────────────────────────────────

const assetItemSchema = z.object({
  balance: num,
  availableAmount: num,
});
export const assetsSchema = z
  .union([z.array(assetItemSchema).nonempty(), assetItemSchema])
  .transform((d) => (Array.isArray(d) ? d[0] : d));

const tickerItemSchema = z.object({
  symbol: z.string(),
  bid: num,
  ask: num,
});
export const tickersSchema = z
  .union([z.array(tickerItemSchema), tickerItemSchema])
  .transform((d) => (Array.isArray(d) ? d : [d]));
export type TickerItem = z.infer<typeof tickerItemSchema>;

const orderItemSchema = z.object({ orderId: id });
export const orderSchema = z
  .union([z.array(orderItemSchema).nonempty(), orderItemSchema])
  .transform((d) => (Array.isArray(d) ? d[0] : d));

const executionItemSchema = z.object({
  orderId: id.optional(),
  positionId: id,
  symbol: z.string().optional(),
  side: sideSchema.optional(),
  price: num,
  size: num.optional(),
  fee: num.optional(),
  timestamp: z.string().optional(),
});
export const executionsSchema = z
  .union([z.array(executionItemSchema), z.object({ list: z.array(executionItemSchema).optional() }), z.undefined()])
  .transform((d) => (d === undefined ? [] : Array.isArray(d) ? d : (d.list ?? [])));

const positionItemSchema = z.object({
  positionId: id,
  symbol: z.string(),
  side: sideSchema,
  price: num,
  size: num,
  timestamp: z.string().optional(),
});
export const positionsSchema = z
  .union([z.array(positionItemSchema), z.object({ list: z.array(positionItemSchema).optional() }), z.undefined()])
  .transform((d) => (d === undefined ? [] : Array.isArray(d) ? d : (d.list ?? [])));
