/**
 * Network model - the static description of the transit system.
 *
 * A network is a set of lines, each an ordered sequence of stations, plus
 * the transfer points where a rider may change from one line to another.
 * It is assembled once at load time and never mutated afterwards.
 */

/** A named line with its stations in stored (travel) order */
export interface Line {
  id: string;
  /** Station names; unique within the line */
  stations: readonly string[];
}

/** A station where two or more lines meet */
export interface TransferPoint {
  station: string;
  /** Ids of the lines serving this station */
  lines: readonly string[];
}

/** Read-only network handle shared by every query */
export interface TransitNetwork {
  readonly lines: readonly Line[];
  readonly transferPoints: readonly TransferPoint[];
}

/**
 * Which way a line may be ridden.
 *
 * - "forward": only from a lower to a higher index of the stored sequence
 * - "both": also against the stored order
 */
export type TravelDirection = "forward" | "both";
