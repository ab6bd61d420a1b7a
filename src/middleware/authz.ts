import type { RequestHandler } from "express";

import type { AuthService } from "../modules/auth/auth.service.js";
import { setRequestAuth } from "../shared/auth-context.js";
import { AuthenticationError } from "../shared/errors.js";
import { extractBearerToken } from "../shared/session-tokens.js";

export type RequireUserOptions = {
  /** Roles admitted by the route; empty means any authenticated user. */
  roles?: readonly string[];
};

/**
 * Runs the access-token pipeline on the Bearer header and attaches the
 * admitted identity to `req.auth`.
 */
export function requireUser(authService: AuthService, options: RequireUserOptions = {}): RequestHandler {
  const roles = options.roles ?? [];
  return (req, _res, next) => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {return next(new AuthenticationError("Missing access token"));}

    authService
      .authorize(token, roles)
      .then((auth) => {
        setRequestAuth(req, auth);
        next();
      })
      .catch(next);
  };
}
