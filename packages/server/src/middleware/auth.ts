/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * On success, sets `c.set("auth", authContext)` with the acting user.
 * On failure, returns 401.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, JwtClaims } from "../types/auth.js";
import { JwtClaimsSchema, JwtHeaderSchema } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const USER_ID_HEADER = "X-User-Id";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

/**
 * Create authentication middleware.
 *
 * Tries X-Api-Key first, then Authorization: Bearer.
 * Returns 401 if neither is present or valid.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    // Strategy 1: API Key
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      auth = { type: "api-key", userId: record.userId };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "JWT authentication not configured"),
            401,
          );
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid or expired JWT"), 401);
        }
        auth = { type: "jwt", userId: claims.sub };
      }
    }

    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    c.set("auth", auth);
    return next();
  };
}

/**
 * Unsecured mode: the acting user is the X-User-Id header, or the
 * configured default user.
 */
export function actingUserMiddleware(defaultUserId: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(USER_ID_HEADER)?.trim();
    const auth: AuthContext =
      header !== undefined && header !== ""
        ? { type: "header", userId: header }
        : { type: "default", userId: defaultUserId };
    c.set("auth", auth);
    await next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

function sign(input: string, secret: string): string {
  return createHmac("sha256", secret).update(input).digest("base64url");
}

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
}

/**
 * Verify a JWT token using HMAC-SHA256.
 *
 * Only supports HS256 (alg: "HS256").
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): JwtClaims | undefined {
  const parts = token.split(".");
  const [headerB64, payloadB64, signatureB64] = parts;
  if (
    parts.length !== 3 ||
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined
  ) {
    return undefined;
  }

  const expected = Buffer.from(sign(`${headerB64}.${payloadB64}`, secret));
  const actual = Buffer.from(signatureB64);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return undefined;
  }

  let header: unknown;
  let payload: unknown;
  try {
    header = decodeSegment(headerB64);
    payload = decodeSegment(payloadB64);
  } catch {
    return undefined;
  }

  if (!JwtHeaderSchema.safeParse(header).success) {
    return undefined;
  }
  const claims = JwtClaimsSchema.safeParse(payload);
  if (!claims.success) {
    return undefined;
  }

  if (claims.data.exp < nowSeconds) {
    return undefined;
  }
  if (expectedIssuer !== undefined && claims.data.iss !== expectedIssuer) {
    return undefined;
  }

  return claims.data;
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");
  const payload = Buffer.from(
    JSON.stringify({ ...claims, iat: claims.iat ?? Math.floor(Date.now() / 1000) }),
  ).toString("base64url");
  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}
