import readline from 'readline';
import { Readable, Writable } from 'stream';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  ErrorCode,
  JSONRPCMessage,
  JSONRPCMessageSchema,
  RequestId,
  isJSONRPCRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { Logger, silentLogger } from './utils/logger';

// Error responses to lines that never became a message; JSON-RPC allows a null id here
interface RawErrorResponse {
  jsonrpc: '2.0';
  id: RequestId | null;
  error: { code: number; message: string };
}

function extractId(value: unknown): RequestId | null {
  if (typeof value !== 'object' || value === null || !('id' in value)) {
    return null;
  }
  const { id } = value;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

/**
 * Newline-delimited JSON-RPC over a pair of streams.
 *
 * Requests are handed to the server one at a time: the next line is not
 * delivered until the in-flight request has been answered. Lines that are not
 * JSON, or not JSON-RPC, are answered here and never reach the server.
 */
export class LineTransport implements Transport {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: Transport['onmessage'];

  private reader?: readline.Interface;
  private readonly pending: string[] = [];
  private inFlight?: RequestId;
  private inputEnded = false;
  private closed = false;

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout,
    private readonly logger: Logger = silentLogger
  ) {}

  async start(): Promise<void> {
    if (this.reader) {
      throw new Error('LineTransport already started');
    }

    this.reader = readline.createInterface({ input: this.input, crlfDelay: Infinity });
    this.reader.on('line', line => {
      this.pending.push(line);
      this.pump();
    });
    this.reader.on('close', () => {
      this.inputEnded = true;
      this.pump();
    });
    this.input.on('error', error => this.onerror?.(error));
  }

  async send(message: JSONRPCMessage): Promise<void> {
    await this.write(JSON.stringify(message));

    const answersInFlight =
      this.inFlight !== undefined &&
      'id' in message &&
      ('result' in message || 'error' in message) &&
      message.id === this.inFlight;
    if (answersInFlight) {
      this.inFlight = undefined;
      setImmediate(() => this.pump());
    }
  }

  async close(): Promise<void> {
    this.finish();
  }

  private finish(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pending.length = 0;
    this.reader?.close();
    this.onclose?.();
  }

  private pump(): void {
    while (this.inFlight === undefined && !this.closed) {
      const line = this.pending.shift();
      if (line === undefined) {
        if (this.inputEnded) {
          this.finish();
        }
        return;
      }
      this.handleLine(line);
    }
  }

  private handleLine(line: string): void {
    const text = line.trim();
    if (!text) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.debug('Rejected line that is not JSON', { reason });
      this.writeError(null, ErrorCode.ParseError, `Parse error: ${reason}`);
      return;
    }

    const result = JSONRPCMessageSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.debug('Rejected message that is not JSON-RPC 2.0');
      this.writeError(extractId(parsed), ErrorCode.InvalidRequest, 'Invalid Request: not a JSON-RPC 2.0 message');
      return;
    }

    const message = result.data;
    if (isJSONRPCRequest(message)) {
      this.inFlight = message.id;
    }
    this.onmessage?.(message);
  }

  private writeError(id: RequestId | null, code: number, message: string): void {
    const response: RawErrorResponse = { jsonrpc: '2.0', id, error: { code, message } };
    this.write(JSON.stringify(response)).catch(error => this.onerror?.(error));
  }

  private write(json: string): Promise<void> {
    return new Promise(resolve => {
      if (this.output.write(`${json}\n`)) {
        resolve();
      } else {
        this.output.once('drain', resolve);
      }
    });
  }
}
