/**
 * Express Application Factory
 * ============================
 * Creates and configures the Express app with all routes and middleware
 */

import cors from "cors";
import express from "express";
import swaggerUi from "swagger-ui-express";

import { swaggerSpec } from "./config/swagger.js";
import type { AppContainer } from "./container.js";
import { errorHandler } from "./middleware/error-handler.js";
import { notFoundHandler } from "./middleware/not-found.js";
import { requestLogger } from "./middleware/request-logger.js";
import { createAuthRouter } from "./modules/auth/index.js";
import { API_PREFIX, SERVICE_NAME, SERVICE_VERSION } from "./shared/constants.js";

export function createApp(container: Pick<AppContainer, "config" | "authService">) {
  const { config, authService } = container;
  const app = express();

  app.disable("x-powered-by");
  app.use(requestLogger);
  app.use(
    cors({
      origin: config.allowedOrigins,
      allowedHeaders: ["Authorization", "Content-Type", "X-Request-ID"],
      exposedHeaders: ["X-Request-ID"],
    })
  );
  app.use(express.json({ limit: "100kb" }));

  // Swagger UI
  app.use("/api-docs", swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.get("/api-docs.json", (_req, res) => {
    res.json(swaggerSpec);
  });

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Liveness probe
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Service is up
   */
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
    });
  });

  app.use(`${API_PREFIX}/auth`, createAuthRouter(authService, { meRoles: config.auth.meRoles }));

  // 404 + error handling (keep last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
