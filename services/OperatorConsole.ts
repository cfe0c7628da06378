import { Mode, RegisterMap, RemoteWriteResult } from '../types';
import { fromSigned16 } from '../utils/registerMath';
import { Logger } from '../utils/logger';
import { formatMemoryView, RegisterReadout } from '../utils/memoryView';
import { GatewayClient } from './GatewayClient';

export const DELTA_STEP = 20;
const VIEW_SLOTS = 10;

export interface ConsoleView {
  connected: boolean;
  readout: RegisterReadout;
  mode: number | undefined;
}

/**
 * OperatorConsole
 *
 * HMI built only on the gateway contract: polls the four spaces for display,
 * toggles the mode and sends single-shot pump deltas in manual mode.
 */
export class OperatorConsole {
  private pendingDelta = 0;
  private lastView: ConsoleView | null = null;
  private logger: Logger;

  constructor(private client: GatewayClient, private map: RegisterMap, logger?: Logger) {
    this.logger = logger ?? new Logger('HMI');
  }

  public get localDelta(): number {
    return this.pendingDelta;
  }

  public async poll(): Promise<ConsoleView> {
    const [coils, discreteInputs, inputRegisters, holdingRegisters] = await Promise.all([
      this.client.getValues('coils', 0, VIEW_SLOTS),
      this.client.getValues('discreteInputs', 0, VIEW_SLOTS),
      this.client.getValues('inputRegisters', 0, VIEW_SLOTS),
      this.client.getValues('holdingRegisters', 0, VIEW_SLOTS)
    ]);
    const rawMode = holdingRegisters[this.map.slots.holdingRegisters.mode];

    this.lastView = {
      connected: this.client.connected,
      readout: { coils, discreteInputs, inputRegisters, holdingRegisters },
      mode: typeof rawMode === 'number' ? rawMode : undefined
    };
    return this.lastView;
  }

  /** Switches between Auto and Manual; any other mode goes to Auto. */
  public async toggleMode(): Promise<RemoteWriteResult> {
    const current = this.lastView?.mode ?? (await this.poll()).mode;
    const next = current === Mode.Auto ? Mode.Manual : Mode.Auto;
    const result = await this.client.writeRegister(this.map.slots.holdingRegisters.mode, next);
    if (result.success) {
      this.logger.info(`Mode set to ${next}`);
      if (this.lastView) this.lastView.mode = next;
    }
    return result;
  }

  public adjustDelta(step: number = DELTA_STEP): number {
    this.pendingDelta += step;
    return this.pendingDelta;
  }

  public async sendDelta(): Promise<RemoteWriteResult> {
    if (this.map.scenario !== 'thermal-relief') {
      return { success: false, error: 'Exception', exceptionCode: 2 };
    }
    const delta = this.pendingDelta;
    const result = await this.client.writeRegister(this.map.slots.holdingRegisters.pumpDelta, fromSigned16(delta));
    if (result.success) {
      this.logger.info(`Sent delta ${delta} to hr[${this.map.slots.holdingRegisters.pumpDelta}]`);
      this.pendingDelta = 0;
    }
    return result;
  }

  /** Dispatches one typed console command. Returns false for unknown input. */
  public async handleCommand(input: string): Promise<boolean> {
    switch (input.trim().toLowerCase()) {
      case 'm': await this.toggleMode(); return true;
      case '+': this.adjustDelta(DELTA_STEP); return true;
      case '-': this.adjustDelta(-DELTA_STEP); return true;
      case 's': await this.sendDelta(); return true;
      case '': return true;
      default: return false;
    }
  }

  public formatView(view: ConsoleView, host: string): string[] {
    const status = view.connected ? `Connected to ${host}` : 'Unconnected';
    const modeName = view.mode === Mode.Manual ? 'Manual' : view.mode === Mode.Auto ? 'Auto' : view.mode === Mode.Idle ? 'Idle' : 'unknown';
    return [
      ...formatMemoryView(view.readout, this.map, { title: `HMI STATUS - ${status}`, pendingDelta: this.pendingDelta }),
      `Current Mode: ${modeName}`,
      'Commands: [m = toggle mode] [+/- = adjust pump delta] [s = send delta] [ENTER = refresh]'
    ];
  }
}
