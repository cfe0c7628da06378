#!/usr/bin/env node
import readline from 'node:readline';
import yargs, { Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { getRegisterMap } from './constants';
import { LogLevel } from './types';
import { AdversarialWriter, parseTarget, TargetFormatError, WriteTarget } from './services/AdversarialWriter';
import { Controller } from './services/Controller';
import { EnvironmentModel } from './services/EnvironmentModel';
import { FieldRuntime } from './services/FieldRuntime';
import { GatewayClient, WebSocketTransport } from './services/GatewayClient';
import { OperatorConsole } from './services/OperatorConsole';
import { PlcRuntime } from './services/PlcRuntime';
import { ProtocolGateway } from './services/ProtocolGateway';
import { RegisterBank } from './services/RegisterBank';
import { SimulationEngine } from './services/SimulationEngine';
import { SnapshotStore } from './services/SnapshotStore';
import { ConfigError, DEFAULT_SECTION, loadConfig, PlantConfig } from './utils/config';
import { createConsoleSink, createFileSink, Logger } from './utils/logger';

const CONSOLE_LEVELS: LogLevel[] = ['info', 'warning', 'error', 'change'];

const withConfig = <T>(y: Argv<T>) =>
  y
    .option('config', { type: 'string', default: 'config/plant.conf', describe: 'Path to the plant configuration' })
    .option('section', { type: 'string', default: DEFAULT_SECTION, describe: 'Configuration section to use' });

const readConfig = (file: string, section: string): PlantConfig | null => {
  try {
    return loadConfig(file, section);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(e.message);
      process.exitCode = 1;
      return null;
    }
    throw e;
  }
};

const onShutdown = (stop: () => Promise<void>) => {
  const handler = () => {
    stop()
      .then(() => process.exit())
      .catch((e: unknown) => {
        console.error('Shutdown failed', e);
        process.exit(1);
      });
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
};

// --- Field process ---

const runField = async (config: PlantConfig, silent: boolean) => {
  const logger = new Logger('Field', [createFileSink(config.fieldLogFile)]);
  if (!silent) logger.subscribe(createConsoleSink(CONSOLE_LEVELS));

  const model = new EnvironmentModel(getRegisterMap(config.scenario), {
    aggressiveness: config.aggressiveness,
    logger: logger.child('Environment')
  });
  const runtime = new FieldRuntime(new SnapshotStore(config.snapshotFile), model, {
    tickRate: config.fieldCycleMs,
    seedStore: new SnapshotStore(config.seedFile),
    logger
  });

  if (!(await runtime.initialize())) {
    process.exitCode = 1;
    return;
  }

  const engine = new SimulationEngine(50, logger.child('Engine'));
  engine.registerTask(runtime);
  engine.start();
  logger.info(`Field simulation running (${config.scenario}, aggressiveness ${config.aggressiveness})`);
  onShutdown(() => engine.stop());
};

// --- PLC process ---

const runPlc = async (config: PlantConfig) => {
  const logger = new Logger('PLC', [createFileSink(config.plcLogFile), createConsoleSink(CONSOLE_LEVELS)]);
  const map = getRegisterMap(config.scenario);
  const bank = new RegisterBank(map.size);

  const runtime = new PlcRuntime(bank, new SnapshotStore(config.snapshotFile), new Controller(map, logger), {
    tickRate: config.statusCycleMs,
    loopMultiplier: config.plcLoopMultiplier,
    logger,
    memoryView: config.memoryView ? (lines) => console.log(lines.join('\n')) : undefined
  });

  const gateway = new ProtocolGateway(bank, { unitId: config.unitId, logger: logger.child('Gateway') });
  gateway.onWrite(() => runtime.markDirty());
  await gateway.listen(config.gatewayPort, config.gatewayHost);

  const engine = new SimulationEngine(50, logger.child('Engine'));
  engine.registerTask(runtime);
  engine.start();
  onShutdown(async () => {
    await engine.stop();
    await gateway.close();
  });
};

// --- HMI ---

const runHmi = (config: PlantConfig) => {
  const logger = new Logger('HMI', [createConsoleSink(['warning', 'error'])]);
  const url = `ws://${config.gatewayHost}:${config.gatewayPort}`;
  const client = new GatewayClient({ unitId: config.unitId, timeoutMs: config.requestTimeoutMs, logger });
  const hmi = new OperatorConsole(client, getRegisterMap(config.scenario), logger);

  const render = async () => {
    const view = await hmi.poll();
    console.clear();
    console.log(hmi.formatView(view, url).join('\n'));
  };

  const engine = new SimulationEngine(50, logger.child('Engine'));
  engine.registerTask({
    id: 'hmi',
    name: 'HMI Poll',
    tickRate: config.hmiPollIntervalMs,
    runCycle: async () => {
      if (!client.connected) {
        try {
          client.attach(await WebSocketTransport.connect(url, config.requestTimeoutMs));
        } catch (e) {
          logger.warning(`Connection to ${url} failed: ${e instanceof Error ? e.message : String(e)}`);
        }
      }
      await render();
    }
  });
  engine.start();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on('line', (line) => {
    hmi.handleCommand(line)
      .then(async (known) => {
        if (!known) logger.warning(`Unknown command '${line.trim()}'`);
        await render();
      })
      .catch((e: unknown) => logger.error(`Command failed: ${String(e)}`));
  });

  onShutdown(async () => {
    rl.close();
    await engine.stop();
    client.close();
  });
};

// --- Adversarial writer ---

interface AttackArgs {
  host: string;
  port: number;
  unit: number;
  target: string;
  num: number;
  wait: number;
  value?: string;
  toggle: boolean;
  random: boolean;
  timeout: number;
}

const runAttack = async (args: AttackArgs) => {
  const logger = new Logger('Attack', [createConsoleSink(['info', 'warning', 'error'])]);

  let target: WriteTarget;
  try {
    target = parseTarget(args.target);
  } catch (e) {
    if (!(e instanceof TargetFormatError)) throw e;
    logger.error(e.message);
    process.exitCode = 1;
    return;
  }

  const url = `ws://${args.host}:${args.port}`;
  let client: GatewayClient;
  try {
    client = await GatewayClient.connect(url, { unitId: args.unit, timeoutMs: args.timeout, logger });
  } catch (e) {
    logger.error(`Could not connect to ${url}: ${e instanceof Error ? e.message : String(e)}`);
    process.exitCode = 1;
    return;
  }
  logger.info(`Connected to ${url}`);

  try {
    const summary = await new AdversarialWriter(client, logger).run({
      target,
      count: args.num,
      waitMs: args.wait,
      value: args.value,
      toggle: args.toggle,
      random: args.random
    });
    if (summary.successes < summary.attempts) process.exitCode = 2;
  } finally {
    client.close();
  }
};

export const buildCli = (argv: string[]) =>
  yargs(argv)
    .scriptName('plant-sim')
    .command(
      'field',
      'Run the field (plant) simulation',
      (y) => withConfig(y).option('silent', { type: 'boolean', default: false, describe: 'Log to file only' }),
      async (args) => {
        const config = readConfig(args.config, args.section);
        if (config) await runField(config, args.silent);
      }
    )
    .command(
      'plc',
      'Run the PLC logic and serve its registers',
      (y) => withConfig(y),
      async (args) => {
        const config = readConfig(args.config, args.section);
        if (config) await runPlc(config);
      }
    )
    .command(
      'hmi',
      'Operator console connected to the PLC gateway',
      (y) => withConfig(y),
      (args) => {
        const config = readConfig(args.config, args.section);
        if (config) runHmi(config);
      }
    )
    .command(
      'attack',
      'Send unsolicited writes to one register',
      (y) =>
        y
          .option('host', { type: 'string', default: '127.0.0.1' })
          .option('port', { type: 'number', default: 5020 })
          .option('unit', { type: 'number', default: 1 })
          .option('target', { type: 'string', demandOption: true, describe: 'e.g. coil[1], hr[5]' })
          .option('num', { type: 'number', default: 1, describe: 'Number of writes' })
          .option('wait', { type: 'number', default: 500, describe: 'Delay between writes in ms' })
          .option('value', { type: 'string', describe: 'Value to write (coil: 1/0/on/off, hr: integer)' })
          .option('toggle', { type: 'boolean', default: false, describe: 'Alternate coil value per write' })
          .option('random', { type: 'boolean', default: false, describe: 'Random register value per write' })
          .option('timeout', { type: 'number', default: 3000, describe: 'Request timeout in ms' })
          .check((a) => {
            if (!Number.isInteger(a.num) || a.num < 1) throw new Error('--num must be a positive integer');
            if (a.wait < 0) throw new Error('--wait must not be negative');
            return true;
          }),
      async (args) => runAttack(args)
    )
    .demandCommand(1)
    .strict()
    .help();

if (require.main === module) {
  buildCli(hideBin(process.argv))
    .parseAsync()
    .catch((e: unknown) => {
      console.error(e instanceof Error ? e.message : String(e));
      process.exit(1);
    });
}
