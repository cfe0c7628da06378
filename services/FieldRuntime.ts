import { ChangeSet, CycleTask, REGISTER_SPACES, Snapshot, SnapshotProjection } from '../types';
import { Logger } from '../utils/logger';
import { describeChange } from './ChangeTracker';
import { EnvironmentModel } from './EnvironmentModel';
import { RegisterBank } from './RegisterBank';
import { SnapshotStore } from './SnapshotStore';

export interface FieldRuntimeOptions {
  tickRate: number;
  /** Commented seed copied into the shared file when it does not exist yet. */
  seedStore?: SnapshotStore;
  logger?: Logger;
}

/** Slots present in a snapshot, merged with the slots the model owns. */
export const projectionOf = (snapshot: Snapshot, extra: SnapshotProjection = {}): SnapshotProjection => {
  const projection: SnapshotProjection = {};
  REGISTER_SPACES.forEach(space => {
    const present = Object.keys(snapshot[space] ?? {}).filter(k => /^\d+$/.test(k)).map(Number);
    const merged = Array.from(new Set([...present, ...(extra[space] ?? [])])).sort((a, b) => a - b);
    if (merged.length > 0) projection[space] = merged;
  });
  return projection;
};

/**
 * The field process: each cycle loads the shared snapshot, advances the
 * plant by one step and writes it back only when a sensor changed.
 */
export class FieldRuntime implements CycleTask {
  public readonly id = 'field';
  public readonly name = 'Field Simulation';
  public readonly tickRate: number;
  public lastChanges: ChangeSet = [];
  private logger: Logger;

  constructor(private store: SnapshotStore, private model: EnvironmentModel, private options: FieldRuntimeOptions) {
    this.tickRate = options.tickRate;
    this.logger = options.logger ?? new Logger('Field');
  }

  /** Creates the shared file from the seed when no other process has yet. */
  public async initialize(): Promise<boolean> {
    if (await this.store.exists()) return true;
    const seedStore = this.options.seedStore;
    if (!seedStore) return false;

    const seed = await seedStore.load();
    if (!seed.success) {
      this.logger.error(`Cannot read seed ${seedStore.filePath}: ${seed.message}`);
      return false;
    }
    const saved = await this.store.saveSnapshot(seed.snapshot);
    if (!saved.success) {
      this.logger.error(`Cannot create ${this.store.filePath}: ${saved.message}`);
      return false;
    }
    this.logger.info(`Generated ${this.store.filePath} from ${seedStore.filePath}`);
    return true;
  }

  public async runCycle(): Promise<void> {
    this.lastChanges = [];

    const loaded = await this.store.load();
    if (!loaded.success) {
      this.logger.warning(`Could not read snapshot: ${loaded.message}`);
      return;
    }

    const map = this.model.registerMap;
    const bank = RegisterBank.fromSnapshot(loaded.snapshot, map.size);
    const changes = this.model.step(bank);
    if (changes.length === 0) return;

    const saved = await this.store.save(bank, projectionOf(loaded.snapshot, map.fieldProjection));
    if (!saved.success) {
      this.logger.error(`Could not write snapshot: ${saved.message}`);
      return;
    }

    this.lastChanges = changes;
    changes.forEach(change => this.logger.change(describeChange(change)));
  }
}
