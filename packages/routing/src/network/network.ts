/**
 * Network assembly and lookup.
 *
 * Every network the planner sees goes through `parseNetwork`, which checks
 * the shape of the data and the model invariants:
 * - line ids are unique
 * - a station appears at most once in a line
 * - a transfer point only names existing lines, each listed once
 * - a transfer station lies on every line it names
 *
 * All problems are collected and reported together. The returned network
 * is frozen.
 */

import type { Line, TransferPoint, TransitNetwork } from "@transfer-planner/types";
import { NetworkConfigError } from "../errors.js";
import { NetworkSchema, formatZodIssues } from "./schema.js";

function findInvariantIssues(
  lines: readonly Line[],
  transferPoints: readonly TransferPoint[],
): string[] {
  const issues: string[] = [];
  const lineById = new Map<string, Line>();

  for (const line of lines) {
    if (lineById.has(line.id)) {
      issues.push(`Duplicate line id "${line.id}"`);
      continue;
    }
    lineById.set(line.id, line);

    const seen = new Set<string>();
    for (const station of line.stations) {
      if (seen.has(station)) {
        issues.push(`Line "${line.id}" lists station "${station}" more than once`);
      }
      seen.add(station);
    }
  }

  for (const tp of transferPoints) {
    const listed = new Set<string>();
    for (const lineId of tp.lines) {
      if (listed.has(lineId)) {
        issues.push(`Transfer point "${tp.station}" lists line "${lineId}" more than once`);
        continue;
      }
      listed.add(lineId);

      const line = lineById.get(lineId);
      if (!line) {
        issues.push(`Transfer point "${tp.station}" references unknown line "${lineId}"`);
      } else if (!line.stations.includes(tp.station)) {
        issues.push(`Transfer point "${tp.station}" is not on line "${lineId}"`);
      }
    }
  }

  return issues;
}

/**
 * Validate raw network data (e.g. parsed JSON) and build a frozen network.
 *
 * @param source - Label used in the error message, typically a file path
 * @throws NetworkConfigError listing every problem found
 */
export function parseNetwork(raw: unknown, source?: string): TransitNetwork {
  const parsed = NetworkSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NetworkConfigError(formatZodIssues(parsed.error), source);
  }

  const { lines, transferPoints } = parsed.data;
  const issues = findInvariantIssues(lines, transferPoints);
  if (issues.length > 0) {
    throw new NetworkConfigError(issues, source);
  }

  return Object.freeze({
    lines: Object.freeze(
      lines.map((l) => Object.freeze({ id: l.id, stations: Object.freeze([...l.stations]) })),
    ),
    transferPoints: Object.freeze(
      transferPoints.map((tp) =>
        Object.freeze({ station: tp.station, lines: Object.freeze([...tp.lines]) }),
      ),
    ),
  });
}

/** Build a network from in-code data. Same checks as `parseNetwork`. */
export function createNetwork(
  lines: readonly Line[],
  transferPoints: readonly TransferPoint[] = [],
): TransitNetwork {
  return parseNetwork({ lines, transferPoints });
}

/** Every distinct station, in line order then sequence order. */
export function listStations(network: TransitNetwork): string[] {
  const stations = new Set<string>();
  for (const line of network.lines) {
    for (const station of line.stations) stations.add(station);
  }
  return [...stations];
}

/** Ids of the lines whose sequence contains `station`. */
export function linesServing(network: TransitNetwork, station: string): string[] {
  return network.lines.filter((l) => l.stations.includes(station)).map((l) => l.id);
}
