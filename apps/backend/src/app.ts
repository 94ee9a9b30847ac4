import express from "express";
import type { Express } from "express";
import cors from "cors";
import { errorHandler, registerRoutes } from "./routes/index.js";
import type { AppContext } from "./routes/index.js";

export function createApp(ctx: AppContext): Express {
  const app = express();
  app.use(
    cors({
      origin: true,
      credentials: true,
      allowedHeaders: ["Content-Type", "Authorization"],
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    }),
  );
  app.use(express.json());
  registerRoutes(app, ctx);
  app.use(errorHandler);
  return app;
}
