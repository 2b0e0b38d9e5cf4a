import type { Vessel, VesselStatus, VesselType } from '../types/maritime.js';

const ACTIVE_STATUSES: ReadonlySet<VesselStatus> = new Set<VesselStatus>(['UNDERWAY', 'IN_PORT']);

export interface FleetUtilization {
  operator: string;
  vesselType: VesselType;
  percent: number;
}

/**
 * Fleet query and aggregate operations
 */
export const FleetQueries = {
  /**
   * Group vessels by operator and type
   */
  groupByOperatorAndType(vessels: readonly Vessel[]): Map<string, Vessel[]> {
    return vessels.reduce((acc, vessel) => {
      const key = `${vessel.operator}|${vessel.type}`;
      const group = acc.get(key);
      if (group) {
        group.push(vessel);
      } else {
        acc.set(key, [vessel]);
      }
      return acc;
    }, new Map<string, Vessel[]>());
  },

  /**
   * Share of each operator's vessels of a type that are underway or in port.
   * Only combinations present in the fleet are reported.
   */
  utilization(vessels: readonly Vessel[]): FleetUtilization[] {
    const rows: FleetUtilization[] = [];
    this.groupByOperatorAndType(vessels).forEach((group) => {
      const [first] = group;
      const active = group.filter((vessel) => ACTIVE_STATUSES.has(vessel.status)).length;
      rows.push({
        operator: first.operator,
        vesselType: first.type,
        percent: (active / group.length) * 100,
      });
    });
    return rows;
  },

  countByStatus(vessels: readonly Vessel[]): Record<VesselStatus, number> {
    const counts: Record<VesselStatus, number> = { UNDERWAY: 0, AT_ANCHOR: 0, WAITING_BERTH: 0, IN_PORT: 0 };
    for (const vessel of vessels) {
      counts[vessel.status] += 1;
    }
    return counts;
  },
};
