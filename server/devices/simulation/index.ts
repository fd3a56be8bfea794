/**
 * Simulation Module
 * Creates a simulated oscilloscope using the real driver over a simulated transport
 *
 * Usage:
 *   const { scope, simulator } = createSimulatedScope();
 *
 * Configuration via environment variables:
 *   SIM_SIGNAL_HZ   - Base signal frequency (default: 1000)
 *   SIM_LATENCY_MS  - Command latency (default: 5ms)
 */

import { createSiglentSds, type SiglentSds } from '../drivers/siglent-sds.js';
import type { ProtocolClient } from '../types.js';
import { createSdsSimulator, type SdsSimulator, type SdsSimulatorConfig } from './sds-simulator.js';
import { createSimulatedTransport } from './simulated-transport.js';

export interface SimulatedScopeConfig extends SdsSimulatorConfig {
  name?: string;
  latencyMs?: number;
  latencyJitterMs?: number;
}

export interface SimulatedScope {
  scope: SiglentSds;
  simulator: SdsSimulator;
  transport: ProtocolClient;
}

/**
 * Load configuration from environment variables with defaults.
 */
export function loadSimulationConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SimulatedScopeConfig {
  const parseFloat = (envVar: string | undefined, defaultVal: number): number => {
    if (!envVar) return defaultVal;
    const parsed = Number.parseFloat(envVar);
    return Number.isNaN(parsed) ? defaultVal : parsed;
  };

  return {
    signalHz: parseFloat(env.SIM_SIGNAL_HZ, 1000),
    latencyMs: parseFloat(env.SIM_LATENCY_MS, 5),
  };
}

export function createSimulatedScope(config: SimulatedScopeConfig = {}): SimulatedScope {
  const { name = 'sim-sds', latencyMs, latencyJitterMs, ...simulatorConfig } = config;

  const simulator = createSdsSimulator(simulatorConfig);
  const transport = createSimulatedTransport(
    (cmd) => simulator.handleCommand(cmd),
    { name, latencyMs, jitterMs: latencyJitterMs }
  );
  const scope = createSiglentSds(transport, { divisions: simulatorConfig.divisions });

  return { scope, simulator, transport };
}
