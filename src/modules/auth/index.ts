/**
 * Auth Module
 * ===========
 * Accounts, session tokens (access/refresh JWTs) and emailed action links.
 */

// ═══════════════════════════════════════════════════════════════════════════
// PRESENTATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createAuthRouter, type AuthRouterOptions } from "./auth.routes.js";

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createAuthService, toPublicUser } from "./auth.service.js";
export type * from "./auth.service.js";

// ═══════════════════════════════════════════════════════════════════════════
// DATA LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createPgUserRepository, normalizeEmail } from "./auth.repository.js";
export type * from "./auth.repository.js";

// ═══════════════════════════════════════════════════════════════════════════
// FOUNDATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export type * from "./auth.schemas.js";
export {
  validateLoginInput,
  validateLogoutInput,
  validatePasswordResetConfirmInput,
  validatePasswordResetRequestInput,
  validateSignupInput,
} from "./auth.schemas.js";
