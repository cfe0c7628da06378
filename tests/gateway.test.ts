import { describe, it, expect, beforeEach } from 'vitest';
import { GatewayClient, LoopbackTransport } from '../services/GatewayClient';
import { ProtocolGateway } from '../services/ProtocolGateway';
import { RegisterBank } from '../services/RegisterBank';
import { BridgeCommand } from '../types';
import { captureLogger, thermalBank } from './fixtures';

const cmd = (fields: Omit<BridgeCommand, 'type' | 'transId' | 'unitId'> & { unitId?: number }): BridgeCommand => ({
  type: 'MODBUS_CMD',
  transId: 7,
  unitId: 1,
  ...fields
});

describe('ProtocolGateway', () => {
  let bank: RegisterBank;
  let gateway: ProtocolGateway;

  beforeEach(() => {
    bank = thermalBank();
    gateway = new ProtocolGateway(bank, { logger: captureLogger().logger });
  });

  it('reads holding registers and coils', () => {
    expect(gateway.handleCommand(cmd({ fc: 3, addr: 0, len: 2 }))).toEqual({
      type: 'MODBUS_RESP', transId: 7, unitId: 1, fc: 3, exceptionCode: 0, data: [55, 900]
    });
    expect(gateway.handleCommand(cmd({ fc: 1, addr: 0, len: 3 }))?.data).toEqual([true, false, true]);
    expect(gateway.handleCommand(cmd({ fc: 4, addr: 1, len: 1 }))?.data).toEqual([55]);
    expect(gateway.handleCommand(cmd({ fc: 2, addr: 3, len: 1 }))?.data).toEqual([false]);
  });

  it('answers bad requests with Modbus exception codes', () => {
    expect(gateway.handleCommand(cmd({ fc: 7, addr: 0 }))?.exceptionCode).toBe(1);
    expect(gateway.handleCommand(cmd({ fc: 3, addr: 99, len: 2 }))?.exceptionCode).toBe(2);
    expect(gateway.handleCommand(cmd({ fc: 3, addr: 0, len: 126 }))?.exceptionCode).toBe(3);
    expect(gateway.handleCommand(cmd({ fc: 6, addr: 0, val: 70000 }))?.exceptionCode).toBe(3);
    expect(gateway.handleCommand(cmd({ fc: 6, addr: 0, val: -1 }))?.exceptionCode).toBe(3);
    expect(gateway.handleCommand(cmd({ fc: 6, addr: 120, val: 1 }))?.exceptionCode).toBe(2);
    expect(bank.getRegister('holdingRegisters', 0)).toBe(55);
  });

  it('ignores other unit ids but answers broadcast', () => {
    expect(gateway.handleCommand(cmd({ fc: 3, addr: 0, len: 1, unitId: 5 }))).toBeNull();
    expect(gateway.handleCommand(cmd({ fc: 3, addr: 0, len: 1, unitId: 0 }))?.data).toEqual([55]);
  });

  it('writes coils and registers and notifies listeners', () => {
    const writes: string[] = [];
    gateway.onWrite((space, address, count, source) => writes.push(`${space}:${address}:${count}:${source}`));

    expect(gateway.handleCommand(cmd({ fc: 5, addr: 4, val: true }), 'hmi')).toEqual({
      type: 'MODBUS_RESP', transId: 7, unitId: 1, fc: 5, exceptionCode: 0, addr: 4, count: 1
    });
    gateway.handleCommand(cmd({ fc: 16, addr: 6, values: [1250, 30] }), 'hmi');
    gateway.handleCommand(cmd({ fc: 15, addr: 0, values: [false, false] }), 'hmi');

    expect(bank.getBit('coils', 4)).toBe(true);
    expect(bank.getRegister('holdingRegisters', 6)).toBe(1250);
    expect(bank.getRegister('holdingRegisters', 7)).toBe(30);
    expect(bank.getBit('coils', 1)).toBe(false);
    expect(writes).toEqual(['coils:4:1:hmi', 'holdingRegisters:6:2:hmi', 'coils:0:2:hmi']);
  });

  it('drops malformed frames without replying', () => {
    const { logger, entries } = captureLogger();
    const gw = new ProtocolGateway(bank, { logger });
    const replies: string[] = [];

    gw.handleFrame('not json', 'test', (frame) => replies.push(frame));
    gw.handleFrame(JSON.stringify({ type: 'MODBUS_CMD', fc: 3 }), 'test', (frame) => replies.push(frame));
    gw.handleFrame(JSON.stringify(cmd({ fc: 3, addr: 0, len: 1 })), 'test', (frame) => replies.push(frame));

    expect(replies).toHaveLength(1);
    expect(gw.getStatus()).toMatchObject({ rxCount: 3, txCount: 1 });
    expect(entries.filter(e => e.level === 'warning')).toHaveLength(2);
    expect(entries[0].message).toBe('Malformed frame from test: not JSON');
  });
});

describe('GatewayClient over loopback', () => {
  let bank: RegisterBank;
  let transport: LoopbackTransport;
  let client: GatewayClient;

  beforeEach(() => {
    bank = thermalBank();
    const gateway = new ProtocolGateway(bank, { logger: captureLogger().logger });
    transport = new LoopbackTransport(gateway);
    client = new GatewayClient({ timeoutMs: 50, logger: captureLogger().logger });
    client.attach(transport);
  });

  it('reads values from every space', async () => {
    expect(await client.getValues('holdingRegisters', 0, 3)).toEqual([55, 900, 75]);
    expect(await client.getValues('inputRegisters', 2, 2)).toEqual([900, 100]);
    expect(await client.getValues('coils', 4, 2)).toEqual([false, false]);
    expect(await client.getValues('discreteInputs', 0, 2)).toEqual([true, true]);
  });

  it('writes coils and holding registers', async () => {
    expect(await client.writeRegister(4, 2)).toEqual({ success: true });
    expect(await client.writeBit(5, true)).toEqual({ success: true });
    expect(await client.setValues('holdingRegisters', 6, [1200, 20])).toEqual({ success: true });
    expect(bank.getRegister('holdingRegisters', 4)).toBe(2);
    expect(bank.getBit('coils', 5)).toBe(true);
    expect(bank.getRegister('holdingRegisters', 7)).toBe(20);
    expect(client.failedWrites).toBe(0);
  });

  it('reports exceptions and counts failed writes', async () => {
    expect(await client.writeRegister(150, 1)).toEqual({ success: false, error: 'Exception', exceptionCode: 2 });
    expect(await client.setValues('inputRegisters', 0, [1])).toEqual({ success: false, error: 'Exception', exceptionCode: 1 });
    expect(await client.getValues('holdingRegisters', 98, 5)).toEqual([undefined, undefined, undefined, undefined, undefined]);
    expect(client.failedWrites).toBe(2);
  });

  it('turns an unanswered request into unknown values', async () => {
    transport.dropRequests = true;
    expect(await client.getValues('holdingRegisters', 0, 2)).toEqual([undefined, undefined]);
    expect(await client.writeRegister(0, 60)).toEqual({ success: false, error: 'Timeout' });
    expect(bank.getRegister('holdingRegisters', 0)).toBe(55);
  });

  it('fails fast once the connection is closed', async () => {
    transport.close();
    expect(client.connected).toBe(false);
    expect(await client.getValues('coils', 0, 1)).toEqual([undefined]);
    expect(await client.writeBit(0, false)).toEqual({ success: false, error: 'Disconnected' });
    expect(client.failedWrites).toBe(1);
  });

  it('logs connection errors before detaching', () => {
    const { logger, entries } = captureLogger();
    const watched = new GatewayClient({ logger });
    const link = new LoopbackTransport(new ProtocolGateway(bank, { logger: captureLogger().logger }));
    watched.attach(link);

    link.fail(new Error('socket hang up'));

    expect(entries.map(e => [e.level, e.message])).toEqual([['debug', 'Connection error: socket hang up']]);
    expect(watched.connected).toBe(false);
  });

  it('resolves requests in flight when the connection drops', async () => {
    transport.dropRequests = true;
    const pending = client.getValues('holdingRegisters', 0, 1);
    transport.close();
    expect(await pending).toEqual([undefined]);
  });
});
