/**
 * Authentication types.
 *
 * Supports two auth strategies:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 *
 * Without either configured the acting user comes from X-User-Id or the
 * configured default user.
 */

import { z } from "zod";

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved acting user, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "header" | "default";
  readonly userId: string;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly userId: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export const JwtHeaderSchema = z.object({
  alg: z.literal("HS256"),
});

export const JwtClaimsSchema = z.object({
  sub: z.string().min(1),
  iss: z.string().optional(),
  exp: z.number(),
  iat: z.number(),
});

export type JwtClaims = z.infer<typeof JwtClaimsSchema>;
