import { WebSocket } from 'ws';
import { z } from 'zod';
import {
  BitSpace,
  BridgeCommand,
  BridgeResponse,
  RegisterSpace,
  RegisterValue,
  RemoteValue,
  RemoteWriteResult,
  WordSpace
} from '../types';
import { Logger } from '../utils/logger';
import { isBitSpace } from './RegisterBank';
import { ProtocolGateway, rawDataToString } from './ProtocolGateway';

/** Frame channel between a client and a gateway. */
export interface BridgeTransport {
  /** Returns false when the frame could not be handed to the channel. */
  send(frame: string): boolean;
  onMessage(listener: (frame: string) => void): void;
  onClose(listener: () => void): void;
  /** Errors after the channel opened; a close follows them. */
  onError(listener: (error: Error) => void): void;
  close(): void;
}

export class WebSocketTransport implements BridgeTransport {
  private errorListeners: ((error: Error) => void)[] = [];

  private constructor(private socket: WebSocket) {
    socket.on('error', (error) => this.errorListeners.forEach(l => l(error)));
  }

  public static connect(url: string, timeoutMs: number = 3000): Promise<WebSocketTransport> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: timeoutMs });
      socket.once('open', () => {
        socket.off('error', reject);
        resolve(new WebSocketTransport(socket));
      });
      socket.once('error', reject);
    });
  }

  public send(frame: string): boolean {
    if (this.socket.readyState !== WebSocket.OPEN) return false;
    this.socket.send(frame);
    return true;
  }

  public onMessage(listener: (frame: string) => void) {
    this.socket.on('message', (data) => listener(rawDataToString(data)));
  }

  public onClose(listener: () => void) {
    this.socket.on('close', listener);
  }

  public onError(listener: (error: Error) => void) {
    this.errorListeners.push(listener);
  }

  public close() {
    this.socket.close();
  }
}

/** In-process channel straight into a gateway; replies arrive asynchronously. */
export class LoopbackTransport implements BridgeTransport {
  private messageListeners: ((frame: string) => void)[] = [];
  private closeListeners: (() => void)[] = [];
  private errorListeners: ((error: Error) => void)[] = [];
  private open = true;
  /** When set, requests are swallowed to emulate an unresponsive device. */
  public dropRequests = false;

  constructor(private gateway: ProtocolGateway, private source: string = 'loopback') {}

  public send(frame: string): boolean {
    if (!this.open) return false;
    if (this.dropRequests) return true;
    this.gateway.handleFrame(frame, this.source, (reply) => {
      setImmediate(() => {
        if (this.open) this.messageListeners.forEach(l => l(reply));
      });
    });
    return true;
  }

  public onMessage(listener: (frame: string) => void) {
    this.messageListeners.push(listener);
  }

  public onClose(listener: () => void) {
    this.closeListeners.push(listener);
  }

  public onError(listener: (error: Error) => void) {
    this.errorListeners.push(listener);
  }

  /** Emulates a broken connection: reports the error, then closes. */
  public fail(error: Error) {
    if (!this.open) return;
    this.errorListeners.forEach(l => l(error));
    this.close();
  }

  public close() {
    if (!this.open) return;
    this.open = false;
    this.closeListeners.forEach(l => l());
  }
}

const bridgeResponseSchema = z.object({
  type: z.literal('MODBUS_RESP'),
  transId: z.number().int(),
  unitId: z.number().int(),
  fc: z.number().int(),
  exceptionCode: z.number().int(),
  data: z.array(z.union([z.number(), z.boolean()])).optional(),
  addr: z.number().int().optional(),
  count: z.number().int().optional()
});

const READ_FUNCTION: Record<RegisterSpace, number> = {
  coils: 1,
  discreteInputs: 2,
  holdingRegisters: 3,
  inputRegisters: 4
};

interface PendingRequest {
  resolve: (response: BridgeResponse | undefined) => void;
  timer: NodeJS.Timeout;
}

export interface GatewayClientOptions {
  unitId?: number;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * GatewayClient
 *
 * Remote access to a ProtocolGateway. Reads never reject: a timeout, an
 * exception response or a lost connection turns every requested slot into
 * undefined. Failed writes are reported and counted.
 */
export class GatewayClient {
  private transport: BridgeTransport | null = null;
  private pending: Map<number, PendingRequest> = new Map();
  private nextTransId = 1;
  private unitId: number;
  private timeoutMs: number;
  private logger: Logger;
  public failedWrites = 0;

  constructor(options: GatewayClientOptions = {}) {
    this.unitId = options.unitId ?? 1;
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.logger = options.logger ?? new Logger('Client');
  }

  public static async connect(url: string, options: GatewayClientOptions = {}): Promise<GatewayClient> {
    const client = new GatewayClient(options);
    client.attach(await WebSocketTransport.connect(url, options.timeoutMs));
    return client;
  }

  public get connected(): boolean {
    return this.transport !== null;
  }

  public attach(transport: BridgeTransport) {
    this.transport = transport;
    transport.onMessage((frame) => this.handleFrame(frame));
    transport.onError((error) => this.logger.debug(`Connection error: ${error.message}`));
    transport.onClose(() => {
      if (this.transport === transport) this.detach();
    });
  }

  public close() {
    const transport = this.transport;
    this.detach();
    transport?.close();
  }

  private detach() {
    this.transport = null;
    this.pending.forEach(p => {
      clearTimeout(p.timer);
      p.resolve(undefined);
    });
    this.pending.clear();
  }

  private handleFrame(frame: string) {
    let json: unknown;
    try {
      json = JSON.parse(frame);
    } catch {
      this.logger.warning('Dropped malformed response frame');
      return;
    }
    const parsed = bridgeResponseSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warning('Dropped response frame with unexpected shape');
      return;
    }
    const pending = this.pending.get(parsed.data.transId);
    if (!pending) return; // late reply to a request that already timed out
    this.pending.delete(parsed.data.transId);
    clearTimeout(pending.timer);
    pending.resolve(parsed.data);
  }

  private request(command: Omit<BridgeCommand, 'type' | 'transId' | 'unitId'>): Promise<BridgeResponse | undefined> {
    const transport = this.transport;
    if (!transport) return Promise.resolve(undefined);

    const transId = this.nextTransId;
    this.nextTransId = this.nextTransId >= 0xFFFF ? 1 : this.nextTransId + 1;
    const frame: BridgeCommand = { type: 'MODBUS_CMD', transId, unitId: this.unitId, ...command };

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending.delete(transId);
        this.logger.warning(`Request ${transId} (FC${command.fc}) timed out after ${this.timeoutMs}ms`);
        resolve(undefined);
      }, this.timeoutMs);
      this.pending.set(transId, { resolve, timer });

      if (!transport.send(JSON.stringify(frame))) {
        clearTimeout(timer);
        this.pending.delete(transId);
        resolve(undefined);
      }
    });
  }

  // --- Reads ---

  public async getValues(space: RegisterSpace, address: number, count: number): Promise<RemoteValue[]> {
    return isBitSpace(space) ? this.readBits(space, address, count) : this.readRegisters(space, address, count);
  }

  public async readBits(space: BitSpace, address: number, count: number): Promise<RemoteValue<boolean>[]> {
    const data = await this.readRaw(space, address, count);
    return data ? data.map(v => Boolean(v)) : new Array<undefined>(count).fill(undefined);
  }

  public async readRegisters(space: WordSpace, address: number, count: number): Promise<RemoteValue<number>[]> {
    const data = await this.readRaw(space, address, count);
    return data ? data.map(v => Number(v)) : new Array<undefined>(count).fill(undefined);
  }

  private async readRaw(space: RegisterSpace, address: number, count: number): Promise<RegisterValue[] | undefined> {
    const response = await this.request({ fc: READ_FUNCTION[space], addr: address, len: count });
    if (!response || response.exceptionCode !== 0 || !response.data || response.data.length < count) return undefined;
    return response.data.slice(0, count);
  }

  // --- Writes ---

  public async setValues(space: RegisterSpace, address: number, values: RegisterValue[]): Promise<RemoteWriteResult> {
    const result = await this.write(space, address, values);
    if (!result.success) {
      this.failedWrites++;
      const detail = result.exceptionCode ? ` (exception ${result.exceptionCode})` : '';
      this.logger.warning(`Write to ${space}[${address}] failed: ${result.error}${detail}`);
    }
    return result;
  }

  public writeBit(address: number, value: boolean): Promise<RemoteWriteResult> {
    return this.setValues('coils', address, [value]);
  }

  public writeRegister(address: number, value: number): Promise<RemoteWriteResult> {
    return this.setValues('holdingRegisters', address, [value]);
  }

  private async write(space: RegisterSpace, address: number, values: RegisterValue[]): Promise<RemoteWriteResult> {
    // Discrete inputs and input registers have no write function
    if (space !== 'coils' && space !== 'holdingRegisters') return { success: false, error: 'Exception', exceptionCode: 1 };
    if (!this.transport) return { success: false, error: 'Disconnected' };

    const single = values.length === 1;
    const command = space === 'coils'
      ? (single ? { fc: 5, addr: address, val: Boolean(values[0]) } : { fc: 15, addr: address, values: values.map(v => Boolean(v)) })
      : (single ? { fc: 6, addr: address, val: Number(values[0]) } : { fc: 16, addr: address, values: values.map(v => Number(v)) });

    const response = await this.request(command);
    if (!response) return { success: false, error: this.transport ? 'Timeout' : 'Disconnected' };
    if (response.exceptionCode !== 0) return { success: false, error: 'Exception', exceptionCode: response.exceptionCode };
    return { success: true };
  }
}
