import { Buffer } from "node:buffer";
import { timingSafeEqual } from "node:crypto";

import { ConfigurationError } from "../errors.js";

export const AUTH_MODES = ["none", "bearer", "apikey"] as const;

export type AuthMode = (typeof AUTH_MODES)[number];

/**
 * Credentials presented by a client, as the outer transport extracted them
 * (typically the `Authorization` header and an API key header).
 */
export interface AuthCredential {
  authorization?: string | null;
  apiKey?: string | null;
}

export interface AuthGateOptions {
  mode: AuthMode;
  /** Shared secret; required unless {@link mode} is `none`. */
  secret?: string | null;
}

const BEARER_PATTERN = /^Bearer\s+([^\s,;]+)\s*$/i;

/**
 * Constant-time comparison of a presented token against the configured
 * secret. Missing tokens, empty secrets and length mismatches all fail.
 */
export function checkToken(presented: string | null | undefined, expected: string): boolean {
  if (!presented || expected.length === 0) {
    return false;
  }
  const provided = Buffer.from(presented);
  const reference = Buffer.from(expected);
  if (provided.length !== reference.length) {
    return false;
  }
  return timingSafeEqual(provided, reference);
}

/** Token carried by an `Authorization: Bearer <token>` value, if any. */
export function extractBearerToken(authorization: string | null | undefined): string | null {
  if (!authorization) {
    return null;
  }
  const match = BEARER_PATTERN.exec(authorization.trim());
  return match ? match[1] : null;
}

/** Pass/fail gate placed in front of every control-surface operation. */
export class AuthGate {
  readonly mode: AuthMode;
  private readonly secret: string;

  constructor(options: AuthGateOptions) {
    const secret = options.secret?.trim() ?? "";
    if (options.mode !== "none" && secret.length === 0) {
      throw new ConfigurationError(`Auth mode "${options.mode}" requires a secret`, [
        "BRIDGE_AUTH_SECRET: must be set when BRIDGE_AUTH_MODE is bearer or apikey",
      ]);
    }
    this.mode = options.mode;
    this.secret = secret;
  }

  authorize(credential: AuthCredential = {}): boolean {
    switch (this.mode) {
      case "none":
        return true;
      case "bearer":
        return checkToken(extractBearerToken(credential.authorization), this.secret);
      case "apikey":
        return checkToken(credential.apiKey?.trim(), this.secret);
    }
  }
}
