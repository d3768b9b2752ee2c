import { describe, it, expect } from "vitest";
import { createNetwork, InvalidQueryError, RoutePlanner } from "@transfer-planner/routing";
import { HealthController } from "./health.controller.js";
import { RouteController } from "./route.controller.js";
import { StationController } from "./station.controller.js";
import { RoutePlanningService } from "../services/route-planning.service.js";
import { RequestValidationError, RouteNotFoundError } from "../errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makePlanner(): RoutePlanner {
  return new RoutePlanner(
    createNetwork(
      [
        { id: "H72", stations: ["Portal 80", "Calle 76", "Calle 72", "Marly"] },
        { id: "G12", stations: ["Marly", "Calle 45", "Calle 57", "Portal Sur"] },
      ],
      [{ station: "Marly", lines: ["H72", "G12"] }],
    ),
  );
}

function makeRouteController(): RouteController {
  return new RouteController(new RoutePlanningService(makePlanner()));
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected a rejection");
}

// ─── RouteController ────────────────────────────────────────────────────────

describe("RouteController.planRoute", () => {
  it("plans the transfer route", async () => {
    const response = await makeRouteController().planRoute({
      origin: "Portal 80",
      destination: "Portal Sur",
    });

    expect(response.route.label).toBe("H72 → G12");
    expect(response.route.stationCount).toBe(7);
    expect(response.route.transferCount).toBe(1);
  });

  it("rejects a body missing fields", async () => {
    const err = await rejectionOf(makeRouteController().planRoute({ origin: "Marly" }));

    expect(err).toBeInstanceOf(RequestValidationError);
    expect(err instanceof RequestValidationError && err.details).toEqual({ destination: "Required" });
  });

  it("rejects a non-object body", async () => {
    const err = await rejectionOf(makeRouteController().planRoute(undefined));

    expect(err).toBeInstanceOf(RequestValidationError);
    expect(err instanceof RequestValidationError && err.details).toEqual({ body: "Required" });
  });

  it("rejects a negative alternatives count", async () => {
    const err = await rejectionOf(
      makeRouteController().planRoute({ origin: "a", destination: "b", alternatives: -1 }),
    );
    expect(err).toBeInstanceOf(RequestValidationError);
  });

  it("surfaces invalid queries", async () => {
    await expect(
      makeRouteController().planRoute({ origin: "Marly", destination: "Marly" }),
    ).rejects.toBeInstanceOf(InvalidQueryError);
  });

  it("surfaces missing routes", async () => {
    await expect(
      makeRouteController().planRoute({ origin: "Portal Sur", destination: "Portal 80" }),
    ).rejects.toBeInstanceOf(RouteNotFoundError);
  });
});

// ─── StationController ──────────────────────────────────────────────────────

describe("StationController", () => {
  it("lists stations in network order", async () => {
    const { stations } = await new StationController(makePlanner()).getStations();
    expect(stations).toEqual([
      "Portal 80",
      "Calle 76",
      "Calle 72",
      "Marly",
      "Calle 45",
      "Calle 57",
      "Portal Sur",
    ]);
  });

  it("returns lines and transfer points", async () => {
    const response = await new StationController(makePlanner()).getLines();

    expect(response.lines.map((l) => l.id)).toEqual(["H72", "G12"]);
    expect(response.transferPoints).toEqual([{ station: "Marly", lines: ["H72", "G12"] }]);
  });
});

// ─── HealthController ───────────────────────────────────────────────────────

describe("HealthController", () => {
  it("reports network statistics", async () => {
    const health = await new HealthController(makePlanner()).getHealth();

    expect(health.status).toBe("ok");
    expect(health.uptime).toBeGreaterThan(0);
    expect(health.network).toEqual({ lines: 2, transferPoints: 1, stations: 7 });
  });
});
