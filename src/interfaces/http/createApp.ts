import type { Container } from "@container";
import { errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";
import cors, { type CorsOptions } from "cors";
import express, { type Express } from "express";

export function corsOptions(origins: string[]): CorsOptions {
  return {
    origin: origins,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  };
}

export function createApp(container: Container): Express {
  const app = express();
  app.use(cors(corsOptions(container.config.corsOrigins)));
  app.use(express.json({ limit: "5mb" }));

  registerRoutes(app, container);

  app.use(errorHandler);

  return app;
}
