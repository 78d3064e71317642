/**
 * Run Configuration Module
 *
 * The only runtime tunable of an analysis is the lower strength target
 * (same units as the measurements). The server additionally takes a port.
 * CLI argument takes priority over environment variable, which takes
 * priority over the default.
 */

import { z } from "zod";
import { DEFAULT_TARGET_LOW } from "../scoring/risk_score.js";
import { InputError } from "./errors.js";

export const DEFAULT_PORT = 3000;

const TargetLowSchema = z.coerce.number().finite();
const PortSchema = z.coerce.number().int().min(0).max(65535);

export interface RunConfig {
  targetLow: number;
}

export interface ServerConfig extends RunConfig {
  port: number;
}

/** First non-blank of CLI argument and environment variable */
function pick(cliArg?: string, envVar?: string): string | undefined {
  for (const raw of [cliArg, envVar]) {
    if (raw !== undefined && raw.trim() !== "") return raw.trim();
  }
  return undefined;
}

/**
 * Parse the lower target from CLI argument and/or environment variable.
 * Defaults to 900 when neither is provided; a non-numeric value throws.
 */
export function parseTargetLow(cliArg?: string, envVar?: string): number {
  const raw = pick(cliArg, envVar);
  if (raw === undefined) return DEFAULT_TARGET_LOW;
  const parsed = TargetLowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(`Invalid target low "${raw}": expected a number`);
  }
  return parsed.data;
}

export function parsePort(cliArg?: string, envVar?: string): number {
  const raw = pick(cliArg, envVar);
  if (raw === undefined) return DEFAULT_PORT;
  const parsed = PortSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(`Invalid port "${raw}": expected an integer between 0 and 65535`);
  }
  return parsed.data;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    targetLow: parseTargetLow(undefined, env.TARGET_LOW),
    port: parsePort(undefined, env.PORT),
  };
}
