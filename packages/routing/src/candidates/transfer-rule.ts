import type { CandidateRoute, TransferPoint } from "@transfer-planner/types";
import type { LineTraversal } from "./traversal.js";

/**
 * Match a ride on `first`, a change at `transfer`, then a ride on `second`.
 *
 * The transfer point must serve both lines and sit strictly after the
 * origin on the first line and strictly before the destination on the
 * second. The transfer station appears once in the joined station list.
 */
export function matchTransfer(
  origin: string,
  destination: string,
  first: LineTraversal,
  second: LineTraversal,
  transfer: TransferPoint,
): CandidateRoute | null {
  if (first.lineId === second.lineId) return null;
  if (!transfer.lines.includes(first.lineId) || !transfer.lines.includes(second.lineId)) {
    return null;
  }

  const from = first.indexOf.get(origin);
  const changeOnFirst = first.indexOf.get(transfer.station);
  const changeOnSecond = second.indexOf.get(transfer.station);
  const to = second.indexOf.get(destination);
  if (
    from === undefined ||
    changeOnFirst === undefined ||
    changeOnSecond === undefined ||
    to === undefined
  ) {
    return null;
  }
  if (from >= changeOnFirst || changeOnSecond >= to) return null;

  const firstLeg = first.stations.slice(from, changeOnFirst + 1);
  const secondLeg = second.stations.slice(changeOnSecond, to + 1);
  // secondLeg starts at the transfer station, which already ends firstLeg
  const stations = [...firstLeg, ...secondLeg.slice(1)];

  return {
    kind: "transfer",
    lines: [first.lineId, second.lineId],
    label: `${first.lineId} → ${second.lineId}`,
    transferStation: transfer.station,
    stations,
    transferCount: 1,
    stationCount: stations.length,
    legs: [
      { lineId: first.lineId, reversed: first.reversed, stations: firstLeg },
      { lineId: second.lineId, reversed: second.reversed, stations: secondLeg },
    ],
  };
}
