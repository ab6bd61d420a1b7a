import type { AuthenticatedUser } from "../shared/auth-context.js";

declare global {
  namespace Express {
    interface Request {
      auth?: AuthenticatedUser;
    }
  }
}

export {};
