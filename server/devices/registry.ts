/**
 * Instrument Registry
 * Owns device configurations and the open session for each device name
 *
 * - Configurations keep insertion order; re-adding a name replaces it in place
 * - At most one session per name; connect/disconnect/remove are serialized per name
 * - Other components borrow a session for one query and never keep it
 */

import type {
  AcquisitionEvent,
  BenchError,
  ConfigError,
  ConnectionError,
  CommandError,
  DeviceConfig,
  DeviceConfigInput,
  DeviceSummary,
  InstrumentBus,
} from './types.js';
import type { Result } from '../../shared/types.js';
import { AUTO_RANGE, Ok, Err, benchError } from '../../shared/types.js';
import { COMMON_COMMANDS, getFunctionInfo, resolveCommand } from './commands.js';
import type { EventChannel } from '../events/EventChannel.js';
import {
  createInstrumentSession,
  queryFailureCode,
  type InstrumentSession,
} from '../sessions/InstrumentSession.js';

export interface InstrumentRegistryConfig {
  /** Timeout for the *IDN? check on connect (default: 5000) */
  identifyTimeoutMs?: number;
  /** Timeout for custom commands (default: 5000) */
  commandTimeoutMs?: number;
}

export interface ConfigureOutcome {
  config: DeviceConfig;
  /** Set when the function or range could not be resolved; the config is still stored */
  commandError?: CommandError;
}

export interface SessionInfo {
  deviceName: string;
  address: string;
  identity: string;
}

export interface PollTarget {
  config: DeviceConfig;
  session: InstrumentSession;
}

export type CommandFailure = BenchError<'ConfigError' | 'QueryTimeout' | 'QueryIOFailure'>;

export interface InstrumentRegistry {
  addOrUpdate(input: DeviceConfigInput): Result<ConfigureOutcome, ConfigError>;
  remove(name: string): Promise<'removed' | 'notFound'>;
  connect(name: string, address?: string): Promise<Result<SessionInfo, ConfigError | ConnectionError>>;
  disconnect(name: string): Promise<'ok' | 'notFound'>;
  listConnected(): Set<string>;
  getConfig(name: string): DeviceConfig | undefined;
  listConfigs(): DeviceConfig[];
  getSession(name: string): InstrumentSession | undefined;
  /** Enabled devices with an open session, in configuration order */
  getPollTargets(): PollTarget[];
  listAddresses(): Promise<string[]>;
  /** Send a custom command; replies are returned for queries ('?'), '' otherwise */
  sendCommand(name: string, command: string): Promise<Result<string, CommandFailure>>;
  getDeviceStatus(name: string): DeviceSummary | null;
  getSummaries(): DeviceSummary[];
  closeAll(): Promise<void>;
}

const DEFAULT_CONFIG: Required<InstrumentRegistryConfig> = {
  identifyTimeoutMs: 5000,
  commandTimeoutMs: 5000,
};

interface ConnectedDevice {
  session: InstrumentSession;
  identity: string;
}

export function createInstrumentRegistry(
  bus: InstrumentBus,
  channel: EventChannel<AcquisitionEvent>,
  config: InstrumentRegistryConfig = {}
): InstrumentRegistry {
  const cfg: Required<InstrumentRegistryConfig> = { ...DEFAULT_CONFIG, ...config };

  const configs = new Map<string, DeviceConfig>();
  const connected = new Map<string, ConnectedDevice>();

  // Per-name mutex for connect/disconnect/remove
  const locks = new Map<string, Promise<void>>();

  function withDeviceLock<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const previousLock = locks.get(name) ?? Promise.resolve();
    let releaseLock: () => void = () => {};
    const current = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    locks.set(name, current);
    return previousLock.then(fn).finally(() => {
      releaseLock();
      if (locks.get(name) === current) locks.delete(name);
    });
  }

  function summarize(name: string): DeviceSummary {
    const stored = configs.get(name);
    const device = connected.get(name);
    return {
      config: stored ? { ...stored } : null,
      name,
      connected: device !== undefined,
      address: device?.session.address ?? null,
      identity: device?.identity ?? null,
    };
  }

  async function closeSession(name: string): Promise<boolean> {
    const device = connected.get(name);
    if (!device) return false;
    connected.delete(name);
    await device.session.close();
    channel.publish({ type: 'deviceDisconnected', deviceName: name });
    console.log(`[Registry] DISCONNECTED: ${name}`);
    return true;
  }

  return {
    addOrUpdate(input: DeviceConfigInput): Result<ConfigureOutcome, ConfigError> {
      const name = input.name.trim();
      if (name === '') {
        return Err(benchError('ConfigError', 'Device name must not be blank'));
      }

      const sampleCount = input.sampleCount ?? 1;
      if (!Number.isInteger(sampleCount) || sampleCount < 1) {
        return Err(benchError('ConfigError', `Sample count must be an integer >= 1 (got ${sampleCount})`));
      }

      const existing = configs.get(name);
      const range = input.range?.trim() || AUTO_RANGE;
      const resolved = resolveCommand(input.function, range);

      let resolvedCommand: string;
      let commandError: CommandError | undefined;
      if (resolved.ok) {
        resolvedCommand = resolved.value;
      } else {
        commandError = resolved.error;
        // Unknown function has nothing to send; a bad range falls back to autorange
        resolvedCommand = getFunctionInfo(input.function)?.query ?? '';
        console.warn(`[Registry] ${name}: ${commandError.message}`);
      }

      const stored: DeviceConfig = {
        name,
        address: input.address?.trim() ?? existing?.address ?? '',
        function: input.function,
        range,
        sampleCount,
        userLabel: input.userLabel ?? '',
        resolvedCommand,
        enabled: input.enabled ?? existing?.enabled ?? true,
      };

      // Map.set on an existing key keeps its position
      configs.set(name, stored);
      channel.publish({ type: 'deviceConfigured', config: { ...stored } });

      return Ok(commandError ? { config: { ...stored }, commandError } : { config: { ...stored } });
    },

    remove(name: string): Promise<'removed' | 'notFound'> {
      return withDeviceLock(name, async (): Promise<'removed' | 'notFound'> => {
        const hadConfig = configs.delete(name);
        const hadSession = await closeSession(name);
        if (!hadConfig && !hadSession) return 'notFound';

        channel.publish({ type: 'deviceRemoved', deviceName: name });
        console.log(`[Registry] REMOVED: ${name}`);
        return 'removed';
      });
    },

    connect(name: string, address?: string): Promise<Result<SessionInfo, ConfigError | ConnectionError>> {
      return withDeviceLock(name, async (): Promise<Result<SessionInfo, ConfigError | ConnectionError>> => {
        const stored = configs.get(name);
        if (!stored) {
          return Err(benchError('ConfigError', `Device "${name}" is not configured`));
        }

        const target = (address ?? stored.address).trim();
        if (target === '') {
          return Err(benchError('ConfigError', `Device "${name}" has no address`));
        }

        const current = connected.get(name);
        if (current && current.session.address !== target) {
          return Err(benchError(
            'ConfigError',
            `Device "${name}" is connected at ${current.session.address}; disconnect it first`,
          ));
        }

        for (const [otherName, other] of connected) {
          if (otherName !== name && other.session.address === target) {
            return Err(benchError('ConfigError', `Address ${target} is in use by "${otherName}"`));
          }
        }

        // Reconnecting at the same address replaces the session
        if (current) {
          await closeSession(name);
        }

        const created = bus.createTransport(target);
        if (!created.ok) {
          return Err(benchError('ConnectionError', created.error.message));
        }
        const transport = created.value;

        const opened = await transport.open();
        if (!opened.ok) {
          return Err(benchError('ConnectionError', `Failed to open ${target}: ${opened.error.message}`));
        }

        const session = createInstrumentSession(name, target, transport);
        const idn = await session.query(COMMON_COMMANDS.identify, cfg.identifyTimeoutMs);
        if (!idn.ok || idn.value.trim() === '') {
          await session.close();
          const reason = idn.ok ? 'empty identification reply' : idn.error.message;
          return Err(benchError('ConnectionError', `No response from ${target}: ${reason}`));
        }

        const identity = idn.value.trim();
        connected.set(name, { session, identity });

        if (stored.address !== target) {
          const updated: DeviceConfig = { ...stored, address: target };
          configs.set(name, updated);
          channel.publish({ type: 'deviceConfigured', config: { ...updated } });
        }

        channel.publish({ type: 'deviceConnected', deviceName: name, address: target, identity });
        console.log(`[Registry] CONNECTED: ${name} at ${target} (${identity})`);

        return Ok({ deviceName: name, address: target, identity });
      });
    },

    disconnect(name: string): Promise<'ok' | 'notFound'> {
      return withDeviceLock(name, async (): Promise<'ok' | 'notFound'> => {
        return (await closeSession(name)) ? 'ok' : 'notFound';
      });
    },

    listConnected(): Set<string> {
      return new Set(connected.keys());
    },

    getConfig(name: string): DeviceConfig | undefined {
      const stored = configs.get(name);
      return stored ? { ...stored } : undefined;
    },

    listConfigs(): DeviceConfig[] {
      return [...configs.values()].map(c => ({ ...c }));
    },

    getSession(name: string): InstrumentSession | undefined {
      return connected.get(name)?.session;
    },

    getPollTargets(): PollTarget[] {
      const targets: PollTarget[] = [];
      for (const stored of configs.values()) {
        if (!stored.enabled) continue;
        const device = connected.get(stored.name);
        if (!device || !device.session.isOpen()) continue;
        targets.push({ config: { ...stored }, session: device.session });
      }
      return targets;
    },

    listAddresses(): Promise<string[]> {
      return bus.listAddresses();
    },

    async sendCommand(name: string, command: string): Promise<Result<string, CommandFailure>> {
      const trimmed = command.trim();
      if (trimmed === '') {
        return Err(benchError('ConfigError', 'Command must not be blank'));
      }

      const session = connected.get(name)?.session;
      if (!session) {
        return Err(benchError('ConfigError', `Device "${name}" is not connected`));
      }

      if (trimmed.includes('?')) {
        const reply = await session.query(trimmed, cfg.commandTimeoutMs);
        return reply.ok
          ? Ok(reply.value)
          : Err(benchError(queryFailureCode(reply.error.reason), reply.error.message));
      }

      const written = await session.write(trimmed, cfg.commandTimeoutMs);
      return written.ok
        ? Ok('')
        : Err(benchError(queryFailureCode(written.error.reason), written.error.message));
    },

    getDeviceStatus(name: string): DeviceSummary | null {
      if (!configs.has(name) && !connected.has(name)) return null;
      return summarize(name);
    },

    getSummaries(): DeviceSummary[] {
      const names = new Set([...configs.keys(), ...connected.keys()]);
      return [...names].map(summarize);
    },

    async closeAll(): Promise<void> {
      const names = [...connected.keys()];
      await Promise.all(names.map(name => withDeviceLock(name, () => closeSession(name))));
    },
  };
}
