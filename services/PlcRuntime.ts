import { ChangeSet, CycleTask } from '../types';
import { Logger } from '../utils/logger';
import { formatMemoryView, readoutFromBank } from '../utils/memoryView';
import { Controller } from './Controller';
import { RegisterBank } from './RegisterBank';
import { SnapshotStore } from './SnapshotStore';

export interface PlcRuntimeOptions {
  tickRate: number;
  /** Control logic runs on every n-th tick; the others only refresh sensors. */
  loopMultiplier: number;
  logger?: Logger;
  memoryView?: (lines: string[]) => void;
}

/**
 * The PLC process. Every tick refreshes the field-owned sensor slots of its
 * bank from the shared snapshot; every loopMultiplier-th tick runs the
 * controller and persists the PLC projection when something changed,
 * including writes that arrived through the gateway since the last save and
 * PLC-owned slots the file no longer agrees with.
 */
export class PlcRuntime implements CycleTask {
  public readonly id = 'plc';
  public readonly name = 'PLC Logic';
  public readonly tickRate: number;
  public iteration = 0;
  public lastChanges: ChangeSet = [];
  private seeded = false;
  private dirty = false;
  private logger: Logger;

  constructor(
    public readonly bank: RegisterBank,
    private store: SnapshotStore,
    private controller: Controller,
    private options: PlcRuntimeOptions
  ) {
    this.tickRate = options.tickRate;
    this.logger = options.logger ?? new Logger('PLC');
  }

  public get isSeeded(): boolean {
    return this.seeded;
  }

  /** Called when a remote write landed in the bank. */
  public markDirty() {
    this.dirty = true;
  }

  public async runCycle(): Promise<void> {
    this.lastChanges = [];
    const map = this.controller.registerMap;

    const loaded = await this.store.load();
    if (!loaded.success) {
      const level = !this.seeded && loaded.error === 'NotFound' ? 'info' : 'warning';
      this.logger.emit(level, `Memory update skipped: ${loaded.message}`);
      return;
    }

    if (!this.seeded) {
      // First contact: take every slot, targets and mode included
      const report = this.bank.applySnapshot(loaded.snapshot);
      this.seeded = true;
      this.logger.info(`Bank seeded from ${this.store.filePath} (${report.applied} slots)`);
    } else {
      this.bank.applySnapshot(loaded.snapshot, map.fieldProjection);
      // A field save racing ours can put stale actuator values back
      if (this.bank.differsFrom(loaded.snapshot, map.plcProjection)) this.dirty = true;
    }

    this.iteration++;
    if (this.iteration % this.options.loopMultiplier === 0) {
      const changes = this.controller.cycle(this.bank);
      this.lastChanges = changes;

      if (changes.length > 0 || this.dirty) {
        const saved = await this.store.save(this.bank, map.plcProjection);
        if (saved.success) this.dirty = false;
        else this.logger.error(`PLC snapshot write failed: ${saved.message}`);
      }
    }

    if (this.options.memoryView) {
      this.options.memoryView(formatMemoryView(readoutFromBank(this.bank), map, {
        title: `MEMORY VIEW - PLC STATUS ITERATION: ${this.iteration}`
      }));
    }
  }
}
