/**
 * Auth Routes
 * ===========
 * Signup, email verification, login/refresh/logout, password reset and "me".
 */

import { type Request, type Response, Router } from "express";

import { asyncHandler } from "../../middleware/async-handler.js";
import { requireUser } from "../../middleware/authz.js";
import { getRequestAuth } from "../../shared/auth-context.js";
import { AuthenticationError } from "../../shared/errors.js";
import { ok } from "../../shared/http.js";
import { extractBearerToken } from "../../shared/session-tokens.js";
import {
  validateLoginInput,
  validateLogoutInput,
  validatePasswordResetConfirmInput,
  validatePasswordResetRequestInput,
  validateSignupInput,
} from "./auth.schemas.js";
import type { AuthService } from "./auth.service.js";

export type AuthRouterOptions = {
  /** Roles admitted by GET /me. */
  meRoles: readonly string[];
};

function requireBearer(req: Request, what: string): string {
  const token = extractBearerToken(req.headers.authorization);
  if (!token) {throw new AuthenticationError(`Missing ${what}`);}
  return token;
}

export function createAuthRouter(authService: AuthService, options: AuthRouterOptions) {
  const authRouter = Router();

  /**
   * @swagger
   * /api/v1/auth/signup:
   *   post:
   *     summary: Create an account and send the verification email
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [first_name, last_name, username, email, password]
   *             properties:
   *               first_name: { type: string, minLength: 2, maxLength: 25 }
   *               last_name: { type: string, minLength: 2, maxLength: 25 }
   *               username: { type: string, minLength: 3, maxLength: 30 }
   *               email: { type: string, format: email }
   *               password: { type: string, minLength: 8 }
   *     responses:
   *       201:
   *         description: Account created (unverified)
   *       400:
   *         description: Invalid input
   *       409:
   *         description: Email already registered
   */
  authRouter.post(
    "/signup",
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateSignupInput(req.body);

      const result = await authService.signup({
        firstName: input.first_name,
        lastName: input.last_name,
        username: input.username,
        email: input.email,
        password: input.password,
      });

      return ok(
        res,
        {
          message: "User created successfully. Please check your email to verify your account.",
          user: result.user,
          verification_sent_to: result.verificationSentTo,
          email_sent: result.emailSent,
          next_step: "Verify your email address, then log in.",
        },
        201
      );
    })
  );

  /**
   * @swagger
   * /api/v1/auth/login:
   *   post:
   *     summary: Exchange credentials for an access/refresh token pair
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email, password]
   *             properties:
   *               email: { type: string, format: email }
   *               password: { type: string }
   *     responses:
   *       200:
   *         description: Token pair issued
   *       401:
   *         description: Invalid credentials
   *       403:
   *         description: Email not verified
   */
  authRouter.post(
    "/login",
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateLoginInput(req.body);

      const result = await authService.login({ email: input.email, password: input.password });

      return ok(res, {
        message: "Login successful",
        access_token: result.accessToken,
        refresh_token: result.refreshToken,
        token_type: "Bearer",
        expires_in: result.accessTokenExpiresIn,
        user: result.user,
      });
    })
  );

  /**
   * @swagger
   * /api/v1/auth/refresh:
   *   post:
   *     summary: Issue a new access token from a refresh token (Bearer header)
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: New access token (and a new refresh token when rotation is enabled)
   *       401:
   *         description: Missing, invalid, expired, revoked or wrong-type token
   */
  authRouter.post(
    "/refresh",
    asyncHandler(async (req: Request, res: Response) => {
      const refreshToken = requireBearer(req, "refresh token");

      const result = await authService.refresh(refreshToken);

      return ok(res, {
        access_token: result.accessToken,
        token_type: "Bearer",
        expires_in: result.accessTokenExpiresIn,
        ...(result.refreshToken ? { refresh_token: result.refreshToken } : {}),
      });
    })
  );

  /**
   * @swagger
   * /api/v1/auth/logout:
   *   post:
   *     summary: Revoke the presented access token (and optionally a refresh token)
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: false
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               refresh_token: { type: string }
   *     responses:
   *       200:
   *         description: Logged out
   *       401:
   *         description: Token rejected
   *       503:
   *         description: Revocation store unavailable
   */
  authRouter.post(
    "/logout",
    asyncHandler(async (req: Request, res: Response) => {
      const accessToken = requireBearer(req, "access token");
      const input = validateLogoutInput(req.body);

      await authService.logout(accessToken, input.refresh_token);

      return ok(res, { message: "Logged out successfully" });
    })
  );

  /**
   * @swagger
   * /api/v1/auth/me:
   *   get:
   *     summary: Current user profile
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: User profile
   *       401:
   *         description: Token rejected
   *       403:
   *         description: Role not allowed
   */
  authRouter.get(
    "/me",
    requireUser(authService, { roles: options.meRoles }),
    asyncHandler(async (req: Request, res: Response) => {
      const auth = getRequestAuth(req);
      if (!auth) {throw new AuthenticationError("Authentication required");}

      const user = await authService.getCurrentUser(auth);
      return ok(res, { user });
    })
  );

  /**
   * @swagger
   * /api/v1/auth/verify/{token}:
   *   get:
   *     summary: Confirm an email address from the emailed link
   *     tags: [Auth]
   *     parameters:
   *       - in: path
   *         name: token
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Verified (or already verified)
   *       400:
   *         description: Invalid or expired token
   *       404:
   *         description: User not found
   */
  authRouter.get(
    "/verify/:token",
    asyncHandler(async (req: Request, res: Response) => {
      const result = await authService.verifyEmail(req.params.token ?? "");

      return ok(res, {
        status: result.status,
        message:
          result.status === "already_verified"
            ? "Email already verified"
            : "Email verified successfully",
        user: result.user,
      });
    })
  );

  /**
   * @swagger
   * /api/v1/auth/password-reset-request:
   *   post:
   *     summary: Email a password reset link (same reply whether or not the account exists)
   *     tags: [Auth]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email]
   *             properties:
   *               email: { type: string, format: email }
   *     responses:
   *       200:
   *         description: Request accepted
   */
  authRouter.post(
    "/password-reset-request",
    asyncHandler(async (req: Request, res: Response) => {
      const input = validatePasswordResetRequestInput(req.body);

      const result = await authService.requestPasswordReset(input.email);
      return ok(res, result);
    })
  );

  /**
   * @swagger
   * /api/v1/auth/password-reset-confirm/{token}:
   *   post:
   *     summary: Set a new password using the emailed reset token
   *     tags: [Auth]
   *     parameters:
   *       - in: path
   *         name: token
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [new_password, confirm_new_password]
   *             properties:
   *               new_password: { type: string, minLength: 8 }
   *               confirm_new_password: { type: string }
   *     responses:
   *       200:
   *         description: Password updated
   *       400:
   *         description: Invalid/expired/used token or mismatched passwords
   */
  authRouter.post(
    "/password-reset-confirm/:token",
    asyncHandler(async (req: Request, res: Response) => {
      const input = validatePasswordResetConfirmInput(req.body);

      await authService.confirmPasswordReset({
        token: req.params.token ?? "",
        newPassword: input.new_password,
        confirmPassword: input.confirm_new_password,
      });

      return ok(res, { message: "Password reset successfully" });
    })
  );

  return authRouter;
}
