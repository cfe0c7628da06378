import { describe, it, expect, beforeEach } from 'vitest';
import { BASIC_MAP, THERMAL_RELIEF_MAP } from '../constants';
import { GatewayClient, LoopbackTransport } from '../services/GatewayClient';
import { OperatorConsole } from '../services/OperatorConsole';
import { ProtocolGateway } from '../services/ProtocolGateway';
import { RegisterBank } from '../services/RegisterBank';
import { basicBank, captureLogger, thermalBank } from './fixtures';

const connect = (bank: RegisterBank): GatewayClient => {
  const client = new GatewayClient({ timeoutMs: 50, logger: captureLogger().logger });
  client.attach(new LoopbackTransport(new ProtocolGateway(bank, { logger: captureLogger().logger })));
  return client;
};

describe('OperatorConsole', () => {
  let bank: RegisterBank;
  let hmi: OperatorConsole;

  beforeEach(() => {
    bank = thermalBank();
    hmi = new OperatorConsole(connect(bank), THERMAL_RELIEF_MAP, captureLogger().logger);
  });

  it('polls the first ten slots of every space', async () => {
    const view = await hmi.poll();
    expect(view.connected).toBe(true);
    expect(view.mode).toBe(1);
    expect(view.readout.holdingRegisters).toEqual([55, 900, 75, 1100, 1, 0, 1300, 15, 0, 0]);
    expect(view.readout.coils.slice(0, 6)).toEqual([true, false, true, false, false, false]);
  });

  it('toggles between Auto and Manual', async () => {
    await hmi.poll();
    await hmi.toggleMode();
    expect(bank.getRegister('holdingRegisters', 4)).toBe(2);
    await hmi.toggleMode();
    expect(bank.getRegister('holdingRegisters', 4)).toBe(1);
  });

  it('puts an idle plant into Auto', async () => {
    bank.writeRegister('holdingRegisters', 4, 0);
    await hmi.toggleMode();
    expect(bank.getRegister('holdingRegisters', 4)).toBe(1);
  });

  it('sends the accumulated delta as a signed word and resets it', async () => {
    await hmi.handleCommand('+');
    await hmi.handleCommand('+');
    await hmi.handleCommand('-');
    expect(hmi.localDelta).toBe(20);
    await hmi.handleCommand('s');
    expect(bank.getRegister('holdingRegisters', 5)).toBe(20);
    expect(hmi.localDelta).toBe(0);

    hmi.adjustDelta(-60);
    await hmi.sendDelta();
    expect(bank.getRegister('holdingRegisters', 5)).toBe(65476);
  });

  it('keeps the local delta when the send fails', async () => {
    const offline = new OperatorConsole(new GatewayClient({ logger: captureLogger().logger }), THERMAL_RELIEF_MAP);
    offline.adjustDelta(40);
    expect(await offline.sendDelta()).toEqual({ success: false, error: 'Disconnected' });
    expect(offline.localDelta).toBe(40);
  });

  it('rejects unknown commands', async () => {
    expect(await hmi.handleCommand('x')).toBe(false);
    expect(await hmi.handleCommand('')).toBe(true);
  });

  it('shows the pending delta in Manual', async () => {
    bank.writeRegister('holdingRegisters', 4, 2);
    hmi.adjustDelta(40);
    const lines = hmi.formatView(await hmi.poll(), 'ws://plc:5020');

    expect(lines[0]).toBe('======== HMI STATUS - Connected to ws://plc:5020 ========');
    expect(lines[1]).toBe('MODE: MANUAL (hr[4] = 2)');
    expect(lines).toContain(`  - ${'Pump Delta (hr 5)'.padEnd(35)}: 40 (pending)`);
    expect(lines).toContain(`  - ${'Pump (coil 0)'.padEnd(35)}: ON`);
    expect(lines).toContain('Current Mode: Manual');
  });

  it('renders unknown values when disconnected', async () => {
    const offline = new OperatorConsole(new GatewayClient({ logger: captureLogger().logger }), THERMAL_RELIEF_MAP);
    const lines = offline.formatView(await offline.poll(), 'ws://plc:5020');

    expect(lines[0]).toBe('======== HMI STATUS - Unconnected ========');
    expect(lines[1]).toBe('MODE: unknown');
    expect(lines).toContain(`  - ${'Temperature (ir 1)'.padEnd(35)}: unknown`);
    expect(lines).toContain(`  - ${'Door Closed (di 0)'.padEnd(35)}: unknown`);
    expect(lines).toContain('Current Mode: unknown');
  });

  it('has no delta register in the basic scenario', async () => {
    const basic = basicBank();
    const operator = new OperatorConsole(connect(basic), BASIC_MAP, captureLogger().logger);
    operator.adjustDelta(20);
    expect(await operator.sendDelta()).toEqual({ success: false, error: 'Exception', exceptionCode: 2 });
    expect(basic.getRegister('holdingRegisters', 5)).toBe(1);
  });
});
