// src/middleware/auth.ts
import { Request, Response, NextFunction } from "express";
import crypto from "crypto";
import { UnauthorizedError } from "../utils/httpErrors";

/**
 * JWT-like bearer tokens signed with HMAC-SHA256.
 *
 * Token format: base64url(header).base64url(payload).base64url(signature)
 */

export interface AuthPayload {
  username: string;
  iat: number; // issued at (unix timestamp)
  exp: number; // expires at (unix timestamp)
}

export interface AuthenticatedRequest extends Request {
  auth?: AuthPayload;
}

function base64urlEncode(data: string): string {
  return Buffer.from(data).toString("base64url");
}

function base64urlDecode(data: string): string {
  return Buffer.from(data, "base64url").toString();
}

function sign(payload: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(payload).digest("base64url");
}

/**
 * Parses "7d", "12h", "30m" or "45s" into seconds. Unknown formats fall back to 7 days.
 */
export function parseExpiresIn(expiresIn: string): number {
  const match = expiresIn.match(/^(\d+)(d|h|m|s)$/);
  if (!match) return 7 * 24 * 60 * 60;

  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case "d": return value * 24 * 60 * 60;
    case "h": return value * 60 * 60;
    case "m": return value * 60;
    default: return value;
  }
}

/**
 * Create an authentication token for a user.
 */
export function createToken(
  username: string,
  secret: string,
  expiresIn: string = "7d",
  now: number = Math.floor(Date.now() / 1000)
): string {
  const header = { alg: "HS256", typ: "JWT" };
  const payload: AuthPayload = {
    username,
    iat: now,
    exp: now + parseExpiresIn(expiresIn),
  };

  const headerB64 = base64urlEncode(JSON.stringify(header));
  const payloadB64 = base64urlEncode(JSON.stringify(payload));
  const signature = sign(`${headerB64}.${payloadB64}`, secret);

  return `${headerB64}.${payloadB64}.${signature}`;
}

function isAuthPayload(value: unknown): value is AuthPayload {
  return (
    typeof value === "object" &&
    value !== null &&
    "username" in value &&
    typeof value.username === "string" &&
    "iat" in value &&
    typeof value.iat === "number" &&
    "exp" in value &&
    typeof value.exp === "number"
  );
}

/**
 * Verify and decode an authentication token.
 */
export function verifyToken(
  token: string,
  secret: string,
  now: number = Math.floor(Date.now() / 1000)
): AuthPayload | null {
  const parts = token.split(".");
  if (parts.length !== 3) return null;

  const [headerB64, payloadB64, signature] = parts;

  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(base64urlDecode(payloadB64));
  } catch {
    return null;
  }

  if (!isAuthPayload(payload) || payload.exp < now) return null;
  return payload;
}

/**
 * Authentication middleware.
 * Accepts `Authorization: Bearer <token>` and sets `req.auth`.
 */
export function authMiddleware(secret: string) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith("Bearer ")) {
      return res.status(401).json({ ok: false, error: "Authentication required" });
    }

    const payload = verifyToken(authHeader.slice(7), secret);
    if (!payload) {
      console.warn(`[auth] Rejected token for ${req.method} ${req.originalUrl}`);
      return res.status(401).json({ ok: false, error: "Invalid or expired token" });
    }

    req.auth = payload;
    next();
  };
}

/**
 * Username of the authenticated caller. Only valid behind authMiddleware.
 */
export function requireUsername(req: AuthenticatedRequest): string {
  if (!req.auth) throw new UnauthorizedError("Authentication required");
  return req.auth.username;
}

export default authMiddleware;
