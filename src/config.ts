import { Command } from 'commander';
import { z } from 'zod';
import { SIMULATION_CONSTANTS } from './constants/simulation.js';
import { ConfigurationError } from './errors.js';

const positiveInt = z.coerce.number().int().positive();

const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535),
  vesselCount: positiveInt,
  tickIntervalSeconds: positiveInt,
  retryCooldownSeconds: positiveInt,
  seed: z.coerce.number().int().nonnegative().optional(),
  backfill: z.boolean(),
});

export type AppConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

const blankToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === '' ? undefined : value;

/**
 * Resolve configuration from command-line flags, then environment variables,
 * then defaults. Throws ConfigurationError when a value does not validate.
 */
export function loadConfig(argv: readonly string[] = process.argv.slice(2), env: Env = process.env): AppConfig {
  const program = new Command();

  program
    .name('maritime-intel-simulator')
    .description('Simulated maritime intelligence feed exported as Prometheus metrics')
    .option('--port <port>', 'HTTP listen port')
    .option('--vessels <count>', 'Number of simulated vessels')
    .option('--interval <seconds>', 'Seconds between live ticks')
    .option('--cooldown <seconds>', 'Seconds to wait after a failed tick')
    .option('--seed <seed>', 'Seed for a reproducible run')
    .option('--no-backfill', 'Skip generating 24 hours of history at startup')
    .exitOverride()
    .parse([...argv], { from: 'user' });

  const opts = program.opts<{
    port?: string;
    vessels?: string;
    interval?: string;
    cooldown?: string;
    seed?: string;
    backfill: boolean;
  }>();

  const parsed = configSchema.safeParse({
    port: opts.port ?? blankToUndefined(env.PORT) ?? SIMULATION_CONSTANTS.DEFAULT_LISTEN_PORT,
    vesselCount: opts.vessels ?? blankToUndefined(env.VESSEL_COUNT) ?? SIMULATION_CONSTANTS.DEFAULT_VESSEL_COUNT,
    tickIntervalSeconds:
      opts.interval ?? blankToUndefined(env.TICK_INTERVAL_SECONDS) ?? SIMULATION_CONSTANTS.TICK_INTERVAL_SECONDS,
    retryCooldownSeconds:
      opts.cooldown ?? blankToUndefined(env.RETRY_COOLDOWN_SECONDS) ?? SIMULATION_CONSTANTS.RETRY_COOLDOWN_SECONDS,
    seed: opts.seed ?? blankToUndefined(env.SIMULATION_SEED),
    backfill: opts.backfill,
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  return parsed.data;
}
