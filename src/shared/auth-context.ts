import type { Request } from "express";

/**
 * Identity admitted by the token validation pipeline.
 */
export type AuthenticatedUser = {
  userId: string;
  email: string;
  role: string;
  tokenId: string;
  expiresAt: Date;
};

export function getRequestAuth(req: Request): AuthenticatedUser | undefined {
  return req.auth;
}

export function setRequestAuth(req: Request, ctx: AuthenticatedUser | undefined): void {
  req.auth = ctx;
}
