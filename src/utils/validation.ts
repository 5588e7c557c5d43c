/**
 * Input validation utilities.
 */

import { z } from "zod";

export const OrderActionSchema = z.enum(["BUY", "SELL"]);

/** Notional order as accepted from strategy code or the HTTP surface */
export const NotionalOrderSchema = z.object({
  conId: z.number().int().positive(),
  action: OrderActionSchema,
  notional: z.number().positive().finite(),
  debug: z.boolean().default(false),
});

/** Path parameter holding an order id */
export const OrderIdSchema = z.coerce.number().int().nonnegative();
