import type { Express, Request, Response, NextFunction, RequestHandler } from "express";
import type { RoutePlanner } from "@transfer-planner/routing";
import { HealthController } from "./controllers/health.controller.js";
import { RouteController } from "./controllers/route.controller.js";
import { StationController } from "./controllers/station.controller.js";
import { RoutePlanningService } from "./services/route-planning.service.js";

/** Adapt a promise-returning action to express, forwarding rejections to the error handler. */
function handle<T>(action: (req: Request) => Promise<T>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    action(req)
      .then((body) => {
        res.json(body);
      })
      .catch(next);
  };
}

export function registerRoutes(app: Express, planner: RoutePlanner): void {
  const health = new HealthController(planner);
  const stations = new StationController(planner);
  const routes = new RouteController(new RoutePlanningService(planner));

  app.get("/health", handle(() => health.getHealth()));
  app.get("/api/stations", handle(() => stations.getStations()));
  app.get("/api/lines", handle(() => stations.getLines()));
  app.post("/api/routes/plan", handle((req) => routes.planRoute(req.body)));
}
