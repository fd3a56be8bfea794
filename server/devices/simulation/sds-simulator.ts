/**
 * SDS Simulator
 * Answers the Siglent SDS commands the acquisition path uses
 *
 * Command set:
 * - *IDN?                  - Identification
 * - TDIV? / TDIV <label>   - Timebase (e.g. "TDIV 1MS")
 * - Cn:VDIV? / Cn:VDIV <v> - Volts per division
 * - Cn:OFST? / Cn:OFST <v> - Vertical offset
 * - Cn:WF? DAT2            - Waveform as a definite length block of signed bytes
 *
 * Each channel carries a sine; channel n runs at n × signalHz.
 */

export interface SdsSimulatorConfig {
  /** Base signal frequency in Hz (default: 1000) */
  signalHz?: number;
  /** Signal amplitude in volts (default: 1) */
  amplitude?: number;
  /** Samples per waveform (default: 1400) */
  points?: number;
  /** Initial seconds/div (default: 1e-3) */
  timePerDivision?: number;
  divisions?: number;
}

export interface SdsSimulator {
  handleCommand(cmd: string): string | Buffer | null;
  getTimePerDivision(): number;
  /** Number of waveform requests answered so far */
  getWaveformCount(): number;
}

interface ChannelSettings {
  vdiv: number;
  offset: number;
}

const TIMEBASE_SCALE: Record<string, number> = {
  PS: 1e-12,
  NS: 1e-9,
  US: 1e-6,
  MS: 1e-3,
  S: 1,
};

// 0.001 -> "1.00E-03", the way the instrument prints numbers
export function formatSiglentNumber(value: number): string {
  const [mantissa, exponent] = value.toExponential(2).toUpperCase().split('E');
  const exp = parseInt(exponent, 10);
  const sign = exp < 0 ? '-' : '+';
  return `${mantissa}E${sign}${String(Math.abs(exp)).padStart(2, '0')}`;
}

export function createSdsSimulator(config: SdsSimulatorConfig = {}): SdsSimulator {
  const {
    signalHz = 1000,
    amplitude = 1,
    points = 1400,
    divisions = 14,
  } = config;

  let timePerDivision = config.timePerDivision ?? 1e-3;
  let waveformCount = 0;
  const channels = new Map<number, ChannelSettings>();

  function settings(channel: number): ChannelSettings {
    let found = channels.get(channel);
    if (!found) {
      found = { vdiv: 0.5, offset: 0 };
      channels.set(channel, found);
    }
    return found;
  }

  function buildWaveform(channel: number): Buffer {
    const { vdiv, offset } = settings(channel);
    const timeSpan = timePerDivision * divisions;
    const data = Buffer.alloc(points);
    const phase = waveformCount * 0.1;

    for (let i = 0; i < points; i++) {
      const t = (i / points) * timeSpan;
      const volts = amplitude * Math.sin(2 * Math.PI * signalHz * channel * t + phase);
      const code = Math.round(((volts + offset) * 25) / vdiv);
      data.writeInt8(Math.max(-128, Math.min(127, code)), i);
    }

    const header = Buffer.from(`C${channel}:WF DAT2,#9${String(points).padStart(9, '0')}`, 'ascii');
    return Buffer.concat([header, data, Buffer.from('\n\n', 'ascii')]);
  }

  function handleCommand(cmd: string): string | Buffer | null {
    const trimmed = cmd.trim().toUpperCase();

    if (trimmed === '*IDN?') {
      return 'Siglent Technologies,SDS1202X-E,SDSSIM0000001,8.2.6.1.37R2';
    }

    // Timebase
    if (trimmed === 'TDIV?') {
      return `TDIV ${formatSiglentNumber(timePerDivision)}S`;
    }
    const tdivMatch = trimmed.match(/^TDIV\s+(\d+(?:\.\d+)?)(PS|NS|US|MS|S)$/);
    if (tdivMatch) {
      const [, value, unit] = tdivMatch;
      timePerDivision = parseFloat(value) * TIMEBASE_SCALE[unit];
      return null;
    }

    const channelMatch = trimmed.match(/^C(\d):(VDIV|OFST|WF)(\?)?\s*(.*)$/);
    if (channelMatch) {
      const [, channelStr, field, isQuery, arg] = channelMatch;
      const channel = parseInt(channelStr, 10);
      const ch = settings(channel);

      switch (field) {
        case 'VDIV':
          if (isQuery) return `C${channel}:VDIV ${formatSiglentNumber(ch.vdiv)}V`;
          ch.vdiv = parseFloat(arg) || ch.vdiv;
          return null;
        case 'OFST':
          if (isQuery) return `C${channel}:OFST ${formatSiglentNumber(ch.offset)}V`;
          ch.offset = parseFloat(arg) || 0;
          return null;
        case 'WF':
          if (isQuery && arg === 'DAT2') {
            const waveform = buildWaveform(channel);
            waveformCount++;
            return waveform;
          }
          return null;
      }
    }

    // Unknown commands: no response (like the real instrument)
    return null;
  }

  return {
    handleCommand,
    getTimePerDivision: () => timePerDivision,
    getWaveformCount: () => waveformCount,
  };
}
