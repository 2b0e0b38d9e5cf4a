import { describe, it, expect } from 'vitest';
import { createFleet, createPort, createVessel, formatVesselId, terminalNames } from '../fleetFactory.js';
import { validatePort, validateVessel } from '../../store/entityStore.js';
import { createSeededRandom } from '../../utils/random.js';
import { SimulationError } from '../../errors.js';
import { TEST_NOW } from '../../__tests__/builders.js';

const PORT_CODES = ['AAAAA', 'BBBBB', 'CCCCC'];

describe('fleet factory', () => {
  it('formats vessel ids', () => {
    expect(formatVesselId(0)).toBe('V0001');
    expect(formatVesselId(74)).toBe('V0075');
  });

  it('names terminals by letter', () => {
    expect(terminalNames(3)).toEqual(['Terminal_A', 'Terminal_B', 'Terminal_C']);
  });

  it('creates a valid fleet with sequential ids', () => {
    const fleet = createFleet(50, createSeededRandom(1), TEST_NOW, PORT_CODES);

    expect(fleet.map((vessel) => vessel.id).slice(0, 3)).toEqual(['V0001', 'V0002', 'V0003']);
    fleet.forEach((vessel) => {
      expect(() => validateVessel(vessel)).not.toThrow();
      expect(PORT_CODES).toContain(vessel.destinationPort);
      expect(vessel.eta.getTime()).toBeGreaterThan(TEST_NOW.getTime());
      expect(vessel.lastPortDeparture.getTime()).toBeLessThan(TEST_NOW.getTime());
      if (vessel.status === 'IN_PORT' || vessel.status === 'WAITING_BERTH') {
        expect(vessel.currentCargo).toBe(0);
      }
    });
  });

  it('refuses to create vessels without ports', () => {
    expect(() => createVessel(0, createSeededRandom(1), TEST_NOW, [])).toThrow(SimulationError);
  });

  it('creates ports from their reference entries', () => {
    const port = createPort(
      {
        code: 'AAAAA',
        name: 'Alpha',
        country: 'Testland',
        countryCode: 'TL',
        latitude: 1,
        longitude: 2,
        berthCapacity: 5,
        terminalCount: 2,
      },
      createSeededRandom(4)
    );

    expect(port.terminals).toEqual(['Terminal_A', 'Terminal_B']);
    expect(port.queueLength).toBeLessThanOrEqual(5);
    expect(port.throughputTeuPerHour).toBe(port.baseThroughputTeuPerHour);
    expect(port.inspectionRate).toBe(port.baseInspectionRate);
    expect(() => validatePort(port)).not.toThrow();
  });
});
