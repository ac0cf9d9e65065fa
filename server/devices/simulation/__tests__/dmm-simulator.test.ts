import { describe, it, expect } from 'vitest';
import { createDmmSimulator } from '../dmm-simulator.js';

describe('DMM Simulator', () => {
  describe('identification', () => {
    it('should answer *IDN? with its serial', () => {
      const sim = createDmmSimulator({ serial: 'SIM00042' });
      expect(sim.handleCommand('*IDN?')).toBe('BENCHLOG,SIM-DMM,SIM00042,1.0');
    });

    it('should default the serial', () => {
      expect(createDmmSimulator().handleCommand('*IDN?')).toBe('BENCHLOG,SIM-DMM,SIM00001,1.0');
    });

    it('should answer *OPC? with 1', () => {
      expect(createDmmSimulator().handleCommand('*OPC?')).toBe('1');
    });
  });

  describe('readings', () => {
    it('should return the exact nominal value without noise', () => {
      const sim = createDmmSimulator({ noisePPM: 0 });
      expect(sim.handleCommand('MEAS:VOLT:DC?')).toBe('5.000000000E+0');
      expect(sim.handleCommand('MEAS:RES?')).toBe('1.000000000E+3');
      expect(sim.handleCommand('MEAS:TEMP?')).toBe('2.350000000E+1');
      expect(sim.handleCommand('MEAS:CURR:DC?')).toBe('1.000000000E-1');
    });

    it('should use configured nominal values', () => {
      const sim = createDmmSimulator({ noisePPM: 0, nominal: { 'VOLT:DC': 3.3 } });
      expect(Number(sim.handleCommand('MEAS:VOLT:DC?'))).toBe(3.3);
    });

    it('should keep noisy readings within the stability bound', () => {
      const sim = createDmmSimulator({ noisePPM: 100 });
      for (let i = 0; i < 50; i++) {
        const value = Number(sim.handleCommand('MEAS:VOLT:DC?'));
        expect(value).toBeGreaterThanOrEqual(4.9995);
        expect(value).toBeLessThanOrEqual(5.0005);
      }
    });

    it('should return nothing for unknown functions', () => {
      const sim = createDmmSimulator({ noisePPM: 0 });
      expect(sim.handleCommand('MEAS:CAP?')).toBeNull();
      expect(sim.getFunction()).toBe('VOLT:DC');
    });

    it('should ignore unknown commands', () => {
      expect(createDmmSimulator().handleCommand('SYST:BEEP')).toBeNull();
    });
  });

  describe('configuration', () => {
    it('should configure function and range with CONF', () => {
      const sim = createDmmSimulator({ noisePPM: 0 });

      expect(sim.handleCommand('CONF:FREQ 1E4')).toBeNull();

      expect(sim.getFunction()).toBe('FREQ');
      expect(sim.getRange()).toBe('1E4');
      expect(sim.handleCommand('READ?')).toBe('1.000000000E+3');
    });

    it('should handle compound configure and read commands', () => {
      const sim = createDmmSimulator({ noisePPM: 0 });

      expect(sim.handleCommand('CONF:RES 1E4;:READ?')).toBe('1.000000000E+3');
      expect(sim.getFunction()).toBe('RES');
      expect(sim.getRange()).toBe('1E4');
    });

    it('should accept lowercase and long-form commands', () => {
      const sim = createDmmSimulator({ noisePPM: 0 });
      expect(sim.handleCommand('measure:curr:ac?')).toBe('5.000000000E-2');
      expect(sim.getFunction()).toBe('CURR:AC');
      expect(sim.getRange()).toBe('AUTO');
    });

    it('should return to DC voltage on *RST', () => {
      const sim = createDmmSimulator({ noisePPM: 0 });
      sim.handleCommand('CONF:TEMP RTD');

      expect(sim.handleCommand('*RST')).toBeNull();

      expect(sim.getFunction()).toBe('VOLT:DC');
      expect(sim.getRange()).toBe('AUTO');
    });
  });
});
