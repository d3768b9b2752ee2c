import express from "express";
import cors from "cors";
import type { RoutePlanner } from "@transfer-planner/routing";
import { registerRoutes } from "./routes.js";
import { errorHandler } from "./middleware/error-handler.js";

export function createApp(planner: RoutePlanner): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  registerRoutes(app, planner);

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
