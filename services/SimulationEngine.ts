import { CycleTask } from '../types';
import { Logger } from '../utils/logger';

interface TaskInstance {
  task: CycleTask;
  lastRun: number;
  running: boolean;
  cycles: number;
}

export interface EngineStatus {
  isRunning: boolean;
  tasks: { id: string; name: string; tickRate: number; cycles: number; running: boolean }[];
}

/**
 * SimulationEngine
 *
 * Cooperative scheduler for the periodic loops of one process. It polls at
 * a base rate and starts every registered task whose tick rate has elapsed.
 * A task is never re-entered while its previous cycle is still in flight,
 * and a task that throws is logged and keeps its schedule.
 */
export class SimulationEngine {
  private tasks: Map<string, TaskInstance> = new Map();
  private inFlight: Set<Promise<void>> = new Set();
  private isRunning: boolean = false;
  private intervalId: NodeJS.Timeout | null = null;
  private logger: Logger;

  constructor(private pollRate: number = 50, logger?: Logger) {
    this.logger = logger ?? new Logger('Engine');
  }

  public registerTask(task: CycleTask) {
    this.tasks.set(task.id, { task, lastRun: Number.NEGATIVE_INFINITY, running: false, cycles: 0 });
    this.logger.info(`Registered task ${task.name} (every ${task.tickRate}ms)`);
  }

  public removeTask(id: string) {
    this.tasks.delete(id);
  }

  public getStatus(): EngineStatus {
    return {
      isRunning: this.isRunning,
      tasks: Array.from(this.tasks.values()).map(t => ({
        id: t.task.id,
        name: t.task.name,
        tickRate: t.task.tickRate,
        cycles: t.cycles,
        running: t.running
      }))
    };
  }

  public start() {
    if (this.isRunning) return;
    this.isRunning = true;
    this.runCycle().catch((e: unknown) => this.logger.error(`Engine cycle failed: ${String(e)}`));

    this.intervalId = setInterval(() => {
      this.runCycle().catch((e: unknown) => this.logger.error(`Engine cycle failed: ${String(e)}`));
    }, this.pollRate);
  }

  /** Stops scheduling and waits for cycles already started to finish. */
  public async stop(): Promise<void> {
    this.isRunning = false;
    if (this.intervalId) clearInterval(this.intervalId);
    this.intervalId = null;
    await Promise.all(Array.from(this.inFlight));
  }

  /**
   * Starts every due task. The returned promise settles when the cycles
   * started by this call have finished.
   */
  public runCycle(now: number = Date.now()): Promise<void> {
    const started: Promise<void>[] = [];

    for (const instance of this.tasks.values()) {
      if (instance.running) continue;
      if (now - instance.lastRun < instance.task.tickRate) continue;

      instance.running = true;
      instance.lastRun = now;

      const run = instance.task.runCycle()
        .catch((e: unknown) => {
          const message = e instanceof Error ? e.message : String(e);
          this.logger.error(`Runtime error in ${instance.task.name}: ${message}`);
        })
        .finally(() => {
          instance.running = false;
          instance.cycles++;
          this.inFlight.delete(run);
        });

      this.inFlight.add(run);
      started.push(run);
    }

    return Promise.all(started).then(() => undefined);
  }
}
