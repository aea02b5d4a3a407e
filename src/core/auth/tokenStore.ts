/**
 * OAuth token persistence.
 *
 * The token itself comes from whatever performed the authorization; these
 * helpers only keep it between runs, as a JSON file or as base64 text.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { DriveFsError } from "../errors";

export const OAuthTokenSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  refresh_token: z.string().optional(),
  expiry: z.string().optional(),
});

export type OAuthToken = z.output<typeof OAuthTokenSchema>;

export class TokenError extends DriveFsError {
  constructor(message: string, public cause?: unknown) {
    super(message, "TOKEN_ERROR");
    this.name = "TokenError";
    Object.setPrototypeOf(this, TokenError.prototype);
  }
}

function parseToken(raw: string, origin: string): OAuthToken {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new TokenError(`unable to decode token from ${origin}: ${err instanceof Error ? err.message : String(err)}`, err);
  }
  const result = OAuthTokenSchema.safeParse(json);
  if (!result.success) {
    throw new TokenError(`unable to decode token from ${origin}: ${result.error.issues[0]?.message ?? "invalid token"}`);
  }
  return result.data;
}

export function loadTokenFromFile(file: string): OAuthToken {
  let raw: string;
  try {
    raw = fs.readFileSync(path.resolve(file), "utf8");
  } catch (err) {
    throw new TokenError(`couldn't open token file: ${err instanceof Error ? err.message : String(err)}`, err);
  }
  return parseToken(raw, file);
}

/** Write the token as JSON, readable by the owner only. */
export function storeTokenToFile(file: string, token: OAuthToken): void {
  try {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(token, null, 2) + "\n", { encoding: "utf8", mode: 0o600 });
    fs.chmodSync(file, 0o600);
  } catch (err) {
    throw new TokenError(`couldn't write token file: ${err instanceof Error ? err.message : String(err)}`, err);
  }
}

/** URL-safe base64 of the token's JSON. */
export function encodeTokenBase64(token: OAuthToken): string {
  return Buffer.from(JSON.stringify(token), "utf8").toString("base64url");
}

/** Accepts URL-safe or standard base64. */
export function decodeTokenBase64(encoded: string): OAuthToken {
  const normalized = encoded.trim().replace(/-/g, "+").replace(/_/g, "/");
  return parseToken(Buffer.from(normalized, "base64").toString("utf8"), "base64 text");
}
