import type { CandidateRoute } from "@transfer-planner/types";

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/**
 * One-line description of a route.
 *
 * e.g. "H72 → G12 via Marly: Portal 80 → ... → Portal Sur (1 transfer, 7 stations)"
 */
export function formatRoute(route: CandidateRoute): string {
  const head =
    route.kind === "transfer" && route.transferStation
      ? `${route.label} via ${route.transferStation}`
      : route.label;
  const counts = `${plural(route.transferCount, "transfer")}, ${plural(route.stationCount, "station")}`;
  return `${head}: ${route.stations.join(" → ")} (${counts})`;
}
