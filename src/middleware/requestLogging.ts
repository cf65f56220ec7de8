// src/middleware/requestLogging.ts
import { Request, Response, NextFunction, RequestHandler } from "express";
import morgan from "morgan";
import { v4 as uuid } from "uuid";

const REQUEST_ID_HEADER = "X-Request-Id";

/**
 * Reuses an incoming X-Request-Id or assigns a new one, and echoes it back.
 */
export function withRequestId(req: Request, res: Response, next: NextFunction) {
  const incoming = req.get(REQUEST_ID_HEADER);
  res.setHeader(REQUEST_ID_HEADER, incoming && incoming.length <= 128 ? incoming : uuid());
  next();
}

morgan.token("request-id", (_req, res) => {
  const id = res.getHeader(REQUEST_ID_HEADER);
  return id === undefined ? "-" : String(id);
});

export function httpLogger(): RequestHandler {
  return morgan(":method :url :status :res[content-length] - :response-time ms [:request-id]", {
    skip: (req) => req.url === "/health",
  });
}
