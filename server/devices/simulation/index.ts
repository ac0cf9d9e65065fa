/**
 * Simulation Module
 * Simulated multimeters reachable through SIM::<name>::INSTR addresses
 *
 * Configuration via environment variables:
 *   SIM_DMM_LATENCY_MS - Command latency (default: 20ms)
 *   SIM_LATENCY_JITTER_MS - Latency jitter (default: 5ms)
 *   SIM_MEASUREMENT_STABILITY_PPM - Proportional reading noise (default: 100 PPM)
 */

import type { Transport } from '../types.js';
import { createDmmSimulator, type DmmSimulator } from './dmm-simulator.js';
import { createSimulatedTransport, formatSimulatedAddress } from './simulated-transport.js';

export interface SimulationConfig {
  latencyMs?: number;
  latencyJitterMs?: number;
  noisePPM?: number;
}

export interface Simulation {
  listAddresses(): string[];
  has(name: string): boolean;
  createTransport(name: string): Transport | null;
  getSimulator(name: string): DmmSimulator | undefined;
}

function loadConfigFromEnv(env: NodeJS.ProcessEnv): Required<SimulationConfig> {
  const parseFloat = (envVar: string | undefined, defaultVal: number): number => {
    if (!envVar) return defaultVal;
    const parsed = Number.parseFloat(envVar);
    return Number.isNaN(parsed) ? defaultVal : parsed;
  };

  return {
    latencyMs: parseFloat(env.SIM_DMM_LATENCY_MS, 20),
    latencyJitterMs: parseFloat(env.SIM_LATENCY_JITTER_MS, 5),
    noisePPM: parseFloat(env.SIM_MEASUREMENT_STABILITY_PPM, 100),
  };
}

/**
 * Create one simulated multimeter per name. Each keeps its own configuration
 * state across connect/disconnect, like a real instrument would.
 */
export function createSimulation(
  names: readonly string[],
  config: SimulationConfig = {},
  env: NodeJS.ProcessEnv = process.env
): Simulation {
  const envConfig = loadConfigFromEnv(env);
  const resolved: Required<SimulationConfig> = {
    latencyMs: config.latencyMs ?? envConfig.latencyMs,
    latencyJitterMs: config.latencyJitterMs ?? envConfig.latencyJitterMs,
    noisePPM: config.noisePPM ?? envConfig.noisePPM,
  };

  const simulators = new Map<string, DmmSimulator>();
  names.forEach((name, index) => {
    simulators.set(name, createDmmSimulator({
      serial: `SIM${String(index + 1).padStart(5, '0')}`,
      noisePPM: resolved.noisePPM,
    }));
  });

  return {
    listAddresses(): string[] {
      return [...simulators.keys()].map(formatSimulatedAddress);
    },

    has(name: string): boolean {
      return simulators.has(name);
    },

    createTransport(name: string): Transport | null {
      const simulator = simulators.get(name);
      if (!simulator) return null;
      return createSimulatedTransport(cmd => simulator.handleCommand(cmd), {
        latencyMs: resolved.latencyMs,
        jitterMs: resolved.latencyJitterMs,
      });
    },

    getSimulator(name: string): DmmSimulator | undefined {
      return simulators.get(name);
    },
  };
}

export type { DmmSimulator } from './dmm-simulator.js';
