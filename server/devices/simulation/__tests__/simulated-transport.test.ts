import { describe, it, expect } from 'vitest';
import {
  createSimulatedTransport,
  formatSimulatedAddress,
  parseSimulatedAddress,
} from '../simulated-transport.js';
import { createSimulation } from '../index.js';

describe('Simulated addresses', () => {
  it('should format and parse SIM addresses', () => {
    expect(formatSimulatedAddress('DMM1')).toBe('SIM::DMM1::INSTR');
    expect(parseSimulatedAddress('SIM::DMM1::INSTR')).toBe('DMM1');
    expect(parseSimulatedAddress('sim::bench-2::instr')).toBe('bench-2');
  });

  it('should reject other schemes', () => {
    expect(parseSimulatedAddress('USB0::0x2A8D::0x1301::INSTR')).toBeNull();
    expect(parseSimulatedAddress('SIM::::INSTR')).toBeNull();
  });
});

describe('Simulated Transport', () => {
  const noLatency = { latencyMs: 0, jitterMs: 0 };

  it('should refuse commands before open', async () => {
    const transport = createSimulatedTransport(() => '1', noLatency);

    const result = await transport.query('*IDN?');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Transport not opened');
    }
  });

  it('should route queries to the handler', async () => {
    const transport = createSimulatedTransport(cmd => `echo ${cmd}`, noLatency);
    await transport.open();

    expect(await transport.query('READ?')).toEqual({ ok: true, value: 'echo READ?' });
  });

  it('should return an empty reply when the handler has none', async () => {
    const transport = createSimulatedTransport(() => null, noLatency);
    await transport.open();

    expect(await transport.query('SYST:BEEP')).toEqual({ ok: true, value: '' });
  });

  it('should pass writes to the handler', async () => {
    const seen: string[] = [];
    const transport = createSimulatedTransport(cmd => {
      seen.push(cmd);
      return null;
    }, noLatency);
    await transport.open();

    const result = await transport.write('*RST');

    expect(result.ok).toBe(true);
    expect(seen).toEqual(['*RST']);
  });

  it('should run commands one at a time in call order', async () => {
    const seen: string[] = [];
    const transport = createSimulatedTransport(cmd => {
      seen.push(cmd);
      return cmd;
    }, { latencyMs: 5, jitterMs: 0 });
    await transport.open();

    const results = await Promise.all([
      transport.query('A?'),
      transport.write('B'),
      transport.query('C?'),
    ]);

    expect(seen).toEqual(['A?', 'B', 'C?']);
    expect(results.map(r => r.ok)).toEqual([true, true, true]);
  });

  it('should report open state', async () => {
    const transport = createSimulatedTransport(() => null, noLatency);
    expect(transport.isOpen()).toBe(false);
    await transport.open();
    expect(transport.isOpen()).toBe(true);
    await transport.close();
    expect(transport.isOpen()).toBe(false);
  });
});

describe('createSimulation()', () => {
  const quiet = { latencyMs: 0, latencyJitterMs: 0, noisePPM: 0 };

  it('should list one address per simulated instrument', () => {
    const simulation = createSimulation(['DMM1', 'DMM2'], quiet, {});
    expect(simulation.listAddresses()).toEqual(['SIM::DMM1::INSTR', 'SIM::DMM2::INSTR']);
    expect(simulation.has('DMM2')).toBe(true);
    expect(simulation.has('DMM3')).toBe(false);
  });

  it('should number serials in order', async () => {
    const simulation = createSimulation(['DMM1', 'DMM2'], quiet, {});
    const transport = simulation.createTransport('DMM2');
    expect(transport).not.toBeNull();
    if (!transport) return;

    await transport.open();
    expect(await transport.query('*IDN?')).toEqual({ ok: true, value: 'BENCHLOG,SIM-DMM,SIM00002,1.0' });
  });

  it('should return null for unknown names', () => {
    expect(createSimulation(['DMM1'], quiet, {}).createTransport('DMM9')).toBeNull();
  });

  it('should keep instrument state across transports', async () => {
    const simulation = createSimulation(['DMM1'], quiet, {});
    const first = simulation.createTransport('DMM1');
    if (!first) throw new Error('expected a transport');
    await first.open();
    await first.write('CONF:FREQ');
    await first.close();

    const second = simulation.createTransport('DMM1');
    if (!second) throw new Error('expected a transport');
    await second.open();

    expect(await second.query('READ?')).toEqual({ ok: true, value: '1.000000000E+3' });
    expect(simulation.getSimulator('DMM1')?.getFunction()).toBe('FREQ');
  });

  it('should read settings from the environment', async () => {
    const simulation = createSimulation(['DMM1'], {}, {
      SIM_DMM_LATENCY_MS: '0',
      SIM_LATENCY_JITTER_MS: '0',
      SIM_MEASUREMENT_STABILITY_PPM: '0',
    });
    const transport = simulation.createTransport('DMM1');
    if (!transport) throw new Error('expected a transport');
    await transport.open();

    expect(await transport.query('MEAS:VOLT:DC?')).toEqual({ ok: true, value: '5.000000000E+0' });
  });
});
