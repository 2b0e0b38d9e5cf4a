/**
 * Reference port list
 *
 * Loaded once from ports.json beside this module and validated on read.
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../errors.js';

const PORTS_FILE = fileURLToPath(new URL('./ports.json', import.meta.url));

export const portReferenceSchema = z.object({
  code: z.string().regex(/^[A-Z]{5}$/),
  name: z.string().min(1),
  country: z.string().min(1),
  countryCode: z.string().length(2),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  berthCapacity: z.number().int().positive(),
  terminalCount: z.number().int().min(1).max(26),
});

export type PortReference = z.infer<typeof portReferenceSchema>;

const portListSchema = z.array(portReferenceSchema).min(2);

let portsCache: PortReference[] | null = null;

export function loadPortReferences(filePath: string = PORTS_FILE): PortReference[] {
  if (filePath === PORTS_FILE && portsCache) {
    return portsCache;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read port list from ${filePath}: ${describeError(error)}`);
  }

  const parsed = portListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid port list in ${filePath}: ${parsed.error.message}`);
  }

  const codes = new Set(parsed.data.map((port) => port.code));
  if (codes.size !== parsed.data.length) {
    throw new ConfigurationError(`Duplicate port codes in ${filePath}`);
  }

  if (filePath === PORTS_FILE) {
    portsCache = parsed.data;
  }
  return parsed.data;
}
