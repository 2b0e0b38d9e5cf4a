import type { CargoMovement, CargoTallies, CargoType } from '../types/maritime.js';
import { TRADE_CONSTANTS } from '../constants/simulation.js';
import { chance, pick, randomInt, type RandomSource } from '../utils/random.js';

export interface TradeUniverse {
  portCodes: readonly string[];
  cargoTypes: readonly CargoType[];
  countries: readonly string[];
}

export interface CargoShare {
  portCode: string;
  cargoType: CargoType;
  percent: number;
}

export interface TradeBalance {
  country: string;
  cargoType: CargoType;
  balanceTeu: number;
}

const KEY_SEPARATOR = '|';

const pickOther = (rng: RandomSource, items: readonly string[], excluded: string): string => {
  const others = items.filter((item) => item !== excluded);
  return pick(rng, others.length > 0 ? others : items);
};

export const volumeByTypeKey = (movement: CargoMovement): string =>
  [movement.portCode, movement.cargoType, movement.originCountry, movement.destinationCountry].join(KEY_SEPARATOR);

export const routeVolumeKey = (movement: CargoMovement): string =>
  [movement.originPort, movement.destinationPort, movement.cargoType].join(KEY_SEPARATOR);

export const emptyTallies = (): CargoTallies => ({ volumeByType: {}, routeVolume: {} });

/**
 * Cargo and trade-route aggregation.
 *
 * Movements feed cumulative tallies that only ever grow. Distribution shares
 * and country balances are independent per-tick samples and are not derived
 * from the tallies.
 */
export const Trade = {
  /**
   * With a 30% chance per tick, one cargo movement between two distinct
   * countries and two distinct ports; otherwise null.
   */
  maybeMoveCargo(universe: TradeUniverse, rng: RandomSource): CargoMovement | null {
    if (!chance(rng, TRADE_CONSTANTS.MOVEMENT_PROBABILITY)) {
      return null;
    }

    const portCode = pick(rng, universe.portCodes);
    const cargoType = pick(rng, universe.cargoTypes);
    const originCountry = pick(rng, universe.countries);
    const destinationCountry = pickOther(rng, universe.countries, originCountry);
    const volumeTeu = randomInt(rng, TRADE_CONSTANTS.MOVEMENT_MIN_TEU, TRADE_CONSTANTS.MOVEMENT_MAX_TEU);
    const originPort = pick(rng, universe.portCodes);
    const destinationPort = pickOther(rng, universe.portCodes, originPort);

    return { portCode, cargoType, originCountry, destinationCountry, originPort, destinationPort, volumeTeu };
  },

  /**
   * Returns new tallies with the movement added to both keys.
   */
  record(tallies: CargoTallies, movement: CargoMovement): CargoTallies {
    const typeKey = volumeByTypeKey(movement);
    const routeKey = routeVolumeKey(movement);
    const volume = Math.max(0, movement.volumeTeu);

    return {
      volumeByType: { ...tallies.volumeByType, [typeKey]: (tallies.volumeByType[typeKey] ?? 0) + volume },
      routeVolume: { ...tallies.routeVolume, [routeKey]: (tallies.routeVolume[routeKey] ?? 0) + volume },
    };
  },

  /**
   * Per-port share of each cargo type against a freshly sampled total.
   * The shares are not normalised and need not add up to 100.
   */
  distribution(universe: TradeUniverse, rng: RandomSource): CargoShare[] {
    const shares: CargoShare[] = [];

    for (const portCode of universe.portCodes) {
      const total = universe.cargoTypes.reduce(
        (sum) => sum + randomInt(rng, TRADE_CONSTANTS.DISTRIBUTION_TOTAL_MIN, TRADE_CONSTANTS.DISTRIBUTION_TOTAL_MAX),
        0
      );

      for (const cargoType of universe.cargoTypes) {
        const amount = randomInt(rng, TRADE_CONSTANTS.DISTRIBUTION_AMOUNT_MIN, TRADE_CONSTANTS.DISTRIBUTION_AMOUNT_MAX);
        shares.push({ portCode, cargoType, percent: total > 0 ? (amount / total) * 100 : 0 });
      }
    }

    return shares;
  },

  /**
   * Exports minus imports in TEU per country and cargo type, sampled fresh each tick.
   */
  balances(universe: TradeUniverse, rng: RandomSource): TradeBalance[] {
    return universe.countries.flatMap((country) =>
      universe.cargoTypes.map((cargoType) => ({
        country,
        cargoType,
        balanceTeu: randomInt(rng, TRADE_CONSTANTS.BALANCE_MIN_TEU, TRADE_CONSTANTS.BALANCE_MAX_TEU),
      }))
    );
  },
};
