/**
 * Domain layer barrel exports
 */

export { VesselDynamics } from './vessel.js';
export type { VesselStepContext } from './vessel.js';

export { PortDynamics, BERTHED_VESSEL_TYPES, PORT_VESSEL_STATES } from './port.js';
export type { PortVesselState } from './port.js';

export { Compliance } from './compliance.js';
export type { SpeedCheck, SpeedZone, InspectionRate } from './compliance.js';

export { Trade, emptyTallies, volumeByTypeKey, routeVolumeKey } from './trade.js';
export type { TradeUniverse, CargoShare, TradeBalance } from './trade.js';

export { FleetQueries } from './fleet.js';
export type { FleetUtilization } from './fleet.js';
