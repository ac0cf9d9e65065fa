/**
 * DMM Simulator
 * Answers the SCPI subset a bench multimeter needs for polling
 *
 * Command set:
 * - *IDN?                          - Identification
 * - *RST / *CLS                    - Reset configuration / clear status
 * - MEAS:<function>?               - Configure for function with autorange, return reading
 * - CONF:<function> [<range>]      - Configure function and range
 * - READ?                          - Reading with the current configuration
 * - Compound commands separated by ';' (e.g. "CONF:VOLT:DC 10;:READ?")
 */

export interface DmmSimulatorConfig {
  /** Serial number reported by *IDN? (default: SIM00001) */
  serial?: string;
  /** Nominal reading per SCPI function node, e.g. { 'VOLT:DC': 5 } */
  nominal?: Record<string, number>;
  /** Proportional reading noise in PPM (default: 100) */
  noisePPM?: number;
}

export interface DmmSimulator {
  handleCommand(cmd: string): string | null;
  getFunction(): string;
  getRange(): string;
}

const DEFAULT_NOMINAL: Record<string, number> = {
  'VOLT:DC': 5.0,
  'VOLT:AC': 1.2,
  'CURR:DC': 0.1,
  'CURR:AC': 0.05,
  'RES': 1000,
  'FRES': 1000,
  'FREQ': 1000,
  'TEMP': 23.5,
};

const DEFAULT_FUNCTION = 'VOLT:DC';

export function createDmmSimulator(config: DmmSimulatorConfig = {}): DmmSimulator {
  const serial = config.serial ?? 'SIM00001';
  const nominal = { ...DEFAULT_NOMINAL, ...config.nominal };
  const noisePPM = config.noisePPM ?? 100;

  let fn = DEFAULT_FUNCTION;
  let range = 'AUTO';

  function reading(): string {
    const base = nominal[fn] ?? 0;
    // Pseudo-Gaussian noise from the sum of three uniform randoms
    const noise = (Math.random() + Math.random() + Math.random() - 1.5) / 1.5;
    const value = base + noise * (noisePPM / 1_000_000) * Math.abs(base);
    return value.toExponential(9).toUpperCase();
  }

  function configure(node: string, param: string | undefined): boolean {
    if (!(node in nominal)) return false;
    fn = node;
    range = param ?? 'AUTO';
    return true;
  }

  // Handle one command of a compound line
  function handleOne(raw: string): string | null {
    const cmd = raw.trim().replace(/^:/, '').toUpperCase();
    if (cmd === '') return null;

    if (cmd === '*IDN?') {
      return `BENCHLOG,SIM-DMM,${serial},1.0`;
    }
    if (cmd === '*RST') {
      fn = DEFAULT_FUNCTION;
      range = 'AUTO';
      return null;
    }
    if (cmd === '*CLS' || cmd === '*WAI') {
      return null;
    }
    if (cmd === '*OPC?') {
      return '1';
    }
    if (cmd === 'READ?') {
      return reading();
    }

    const measure = cmd.match(/^MEAS(?:URE)?:([A-Z:]+)\?(?:\s+(\S+))?$/);
    if (measure) {
      return configure(measure[1], measure[2]) ? reading() : null;
    }

    const conf = cmd.match(/^CONF(?:IGURE)?:([A-Z:]+)(?:\s+(\S+))?$/);
    if (conf) {
      configure(conf[1], conf[2]);
      return null;
    }

    return null;
  }

  function handleCommand(cmd: string): string | null {
    let response: string | null = null;
    for (const part of cmd.split(';')) {
      const result = handleOne(part);
      if (result !== null) response = result;
    }
    return response;
  }

  return {
    handleCommand,
    getFunction: () => fn,
    getRange: () => range,
  };
}
