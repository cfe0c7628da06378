import { WebSocketServer, WebSocket, RawData } from 'ws';
import { z } from 'zod';
import { BridgeCommand, BridgeResponse, BridgeStatus, RegisterSpace, RegisterValue } from '../types';
import { UINT16_MAX } from '../constants';
import { Logger } from '../utils/logger';
import { RegisterBank } from './RegisterBank';

export const EXCEPTION_NAMES: Record<number, string> = {
  1: 'Illegal Function',
  2: 'Illegal Data Address',
  3: 'Illegal Data Value',
  4: 'Slave Device Failure'
};

const MAX_READ_BITS = 2000;
const MAX_READ_REGISTERS = 125;

const registerValue = z.union([z.number(), z.boolean()]);

export const bridgeCommandSchema = z.object({
  type: z.literal('MODBUS_CMD'),
  transId: z.number().int(),
  unitId: z.number().int(),
  fc: z.number().int(),
  addr: z.number().int(),
  len: z.number().int().optional(),
  val: registerValue.optional(),
  values: z.array(registerValue).optional()
});

export type WriteListener = (space: RegisterSpace, address: number, count: number, source: string) => void;

export interface ProtocolGatewayOptions {
  unitId?: number;
  logger?: Logger;
}

export const rawDataToString = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
};

const isRegisterWord = (v: RegisterValue): v is number =>
  typeof v === 'number' && Number.isInteger(v) && v >= 0 && v <= UINT16_MAX;

/**
 * ProtocolGateway
 *
 * Serves a RegisterBank to remote masters. Requests arrive as JSON bridge
 * frames carrying Modbus function codes and are answered against the live
 * bank, with Modbus exception codes for bad functions, addresses or values.
 */
export class ProtocolGateway {
  private server: WebSocketServer | null = null;
  private writeListeners: Set<WriteListener> = new Set();
  private logger: Logger;
  private unitId: number;
  private status: BridgeStatus = {
    listening: false,
    url: '',
    clients: 0,
    rxCount: 0,
    txCount: 0
  };

  constructor(private bank: RegisterBank, options: ProtocolGatewayOptions = {}) {
    this.unitId = options.unitId ?? 1;
    this.logger = options.logger ?? new Logger('Gateway');
  }

  public getStatus(): BridgeStatus {
    return { ...this.status };
  }

  public onWrite(listener: WriteListener): () => void {
    this.writeListeners.add(listener);
    return () => this.writeListeners.delete(listener);
  }

  // --- Network ---

  public listen(port: number, host: string = '0.0.0.0'): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ port, host });

      server.once('error', reject);
      server.once('listening', () => {
        server.off('error', reject);
        server.on('error', (e) => this.logger.error(`Gateway server error: ${e.message}`));
        this.status.listening = true;
        this.status.url = `ws://${host}:${port}`;
        this.logger.info(`Register gateway listening on ${this.status.url}`);
        resolve();
      });

      server.on('connection', (socket, request) => {
        const source = `${request.socket.remoteAddress ?? 'unknown'}:${request.socket.remotePort ?? 0}`;
        this.status.clients++;
        this.logger.info(`Master connected: ${source}`);

        socket.on('message', (data) => {
          this.handleFrame(rawDataToString(data), source, (frame) => {
            if (socket.readyState === WebSocket.OPEN) socket.send(frame);
          });
        });
        socket.on('close', () => {
          this.status.clients--;
          this.logger.info(`Master disconnected: ${source}`);
        });
      });

      this.server = server;
    });
  }

  public close(): Promise<void> {
    const server = this.server;
    this.server = null;
    this.status.listening = false;
    if (!server) return Promise.resolve();

    server.clients.forEach(client => client.terminate());
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  // --- Frame handling ---

  /** Decodes one frame and replies with the encoded response, if any. */
  public handleFrame(text: string, source: string, reply: (frame: string) => void) {
    this.status.rxCount++;

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      this.logger.warning(`Malformed frame from ${source}: not JSON`);
      return;
    }

    const parsed = bridgeCommandSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warning(`Malformed frame from ${source}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
      return;
    }

    const response = this.handleCommand(parsed.data, source);
    if (response) {
      reply(JSON.stringify(response));
      this.status.txCount++;
    }
  }

  public handleCommand(cmd: BridgeCommand, source: string = 'External Master'): BridgeResponse | null {
    const { transId, unitId, fc, addr } = cmd;
    if (this.unitId !== unitId && unitId !== 0) return null;

    const len = cmd.len ?? 1;
    const base: BridgeResponse = { type: 'MODBUS_RESP', transId, unitId, fc, exceptionCode: 0 };
    const fail = (code: number, context: string): BridgeResponse => {
      this.handleException(code, context, source);
      return { ...base, exceptionCode: code };
    };

    switch (fc) {
      case 1:
      case 2: {
        const space = fc === 1 ? 'coils' : 'discreteInputs';
        if (len < 1 || len > MAX_READ_BITS) return fail(3, `FC${fc} quantity ${len}`);
        const result = this.bank.readBits(space, addr, len);
        if (!result.success) return fail(2, result.message);
        this.logger.packet(`${source} -> Server: FC${fc} Read ${space} ${addr} x${len}`);
        return { ...base, data: result.values };
      }
      case 3:
      case 4: {
        const space = fc === 3 ? 'holdingRegisters' : 'inputRegisters';
        if (len < 1 || len > MAX_READ_REGISTERS) return fail(3, `FC${fc} quantity ${len}`);
        const result = this.bank.readRegisters(space, addr, len);
        if (!result.success) return fail(2, result.message);
        this.logger.packet(`${source} -> Server: FC${fc} Read ${space} ${addr} x${len}`);
        return { ...base, data: result.values };
      }
      case 5: {
        if (cmd.val === undefined) return fail(3, 'FC5 without value');
        const result = this.bank.writeBit('coils', addr, Boolean(cmd.val));
        if (!result.success) return fail(2, result.message);
        this.notifyWrite('coils', addr, 1, source, `Write Coil ${addr}: ${Boolean(cmd.val)}`);
        return { ...base, addr, count: 1 };
      }
      case 6: {
        const val = cmd.val;
        if (val === undefined || !isRegisterWord(val)) return fail(3, `FC6 value ${String(val)}`);
        const result = this.bank.writeRegister('holdingRegisters', addr, val);
        if (!result.success) return fail(2, result.message);
        this.notifyWrite('holdingRegisters', addr, 1, source, `Write Register ${addr}: ${val}`);
        return { ...base, addr, count: 1 };
      }
      case 15: {
        const values = cmd.values;
        if (!values || values.length === 0) return fail(3, 'FC15 without values');
        const result = this.bank.writeBits('coils', addr, values.map(v => Boolean(v)));
        if (!result.success) return fail(2, result.message);
        this.notifyWrite('coils', addr, values.length, source, `Write ${values.length} Coils at ${addr}`);
        return { ...base, addr, count: values.length };
      }
      case 16: {
        const values = cmd.values;
        if (!values || values.length === 0 || values.length > MAX_READ_REGISTERS) return fail(3, 'FC16 quantity');
        const words = values.filter(isRegisterWord);
        if (words.length !== values.length) return fail(3, 'FC16 value outside 0..65535');
        const result = this.bank.writeRegisters('holdingRegisters', addr, words);
        if (!result.success) return fail(2, result.message);
        this.notifyWrite('holdingRegisters', addr, words.length, source, `Write ${words.length} Registers at ${addr}`);
        return { ...base, addr, count: words.length };
      }
      default:
        return fail(1, `Function code ${fc}`);
    }
  }

  private notifyWrite(space: RegisterSpace, addr: number, count: number, source: string, info: string) {
    this.logger.packet(`${source} -> Server: ${info}`);
    this.writeListeners.forEach(listener => listener(space, addr, count, source));
  }

  private handleException(code: number, context: string, source: string) {
    const errorMsg = EXCEPTION_NAMES[code] || 'Unknown Exception';
    this.logger.error(`Modbus Exception ${code} (${errorMsg}): ${context} [Src: ${source}]`);
  }
}
