/**
 * Express API Server: session status and command surface
 *
 *   GET    /api/status        Connection and store status
 *   GET    /api/universes     Every universe with its instruments
 *   GET    /api/portfolio     Positions and holdings
 *   GET    /api/orders        Trades in the book
 *   POST   /api/orders        Place a notional order { conId, action, notional, debug? }
 *   DELETE /api/orders/:id    Cancel an order this session owns
 *   POST   /api/red-button    Ask the gateway to cancel every open order
 */

import express, { type Response } from "express";
import { ZodError } from "zod";
import { componentLogger, describeError } from "./utils/logger.js";
import { NotionalOrderSchema, OrderIdSchema } from "./utils/validation.js";
import {
  NotConnectedError,
  OrderNotFoundError,
  OrderOwnershipError,
  PriceUnavailableError,
} from "./types/errors.js";
import type { TradingSession } from "./session/trading-session.js";

const log = componentLogger("server");

/** HTTP status for an error raised by a session command */
export function errorStatus(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof OrderOwnershipError) return 403;
  if (err instanceof OrderNotFoundError) return 404;
  if (err instanceof PriceUnavailableError) return 502;
  if (err instanceof NotConnectedError) return 503;
  return 500;
}

function sendError(res: Response, err: unknown): void {
  const status = errorStatus(err);
  if (status >= 500) log.error(`Request failed: ${describeError(err)}`);
  const error = err instanceof ZodError
    ? err.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    : err instanceof Error ? err.message : String(err);
  res.status(status).json({ success: false, error });
}

export function createServer(session: TradingSession): express.Express {
  const app = express();
  app.use(express.json());

  // ── CORS for local development ──────────────────────────────
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "Content-Type");
    next();
  });

  app.get("/api/status", (_req, res) => {
    res.json({ success: true, data: session.status() });
  });

  app.get("/api/universes", (_req, res) => {
    const universes = session.getUniverses().map((universe) => ({
      name: universe.name,
      instruments: universe.instruments(),
    }));
    res.json({ success: true, data: universes });
  });

  app.get("/api/portfolio", (_req, res) => {
    res.json({
      success: true,
      data: {
        positions: session.portfolio.positions(),
        items: session.portfolio.items(),
        totalMarketValue: session.portfolio.totalMarketValue(),
        totalUnrealizedPnL: session.portfolio.totalUnrealizedPnL(),
      },
    });
  });

  app.get("/api/orders", (_req, res) => {
    res.json({ success: true, data: session.book.all() });
  });

  app.post("/api/orders", async (req, res) => {
    try {
      const params = NotionalOrderSchema.parse(req.body);
      const instrument = session.findInstrument(params.conId);
      if (!instrument) {
        res.status(404).json({ success: false, error: `Unknown instrument ${params.conId}` });
        return;
      }

      const placed = await session.placeOrder(instrument, params.action, params.notional, {
        debug: params.debug,
      });
      const result = await placed.progress.waitValue();
      res.status(201).json({
        success: true,
        data: {
          orderId: result.orderId,
          status: result.status,
          quantity: placed.request.quantity,
          limitPrice: placed.request.limitPrice,
          price: placed.price,
        },
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.delete("/api/orders/:id", (req, res) => {
    try {
      const orderId = OrderIdSchema.parse(req.params.id);
      const trade = session.cancelOrder(orderId);
      res.json({ success: true, data: { orderId, status: trade.order.status } });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post("/api/red-button", (_req, res) => {
    try {
      session.redButton();
      res.status(202).json({ success: true, data: { requested: true } });
    } catch (err) {
      sendError(res, err);
    }
  });

  return app;
}
