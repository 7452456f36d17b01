import { Logger, silentLogger } from './logger';
import { CommandResult, CommandRunner, RunOptions, describeCommand } from './runner';
import { SubprocessError } from '../types';

// Address of the adb server; adb's own default (127.0.0.1:5037) applies when unset
export interface AdbServerAddress {
  host?: string;
  port?: number;
}

export interface AdbBridgeOptions {
  adbPath?: string;
  server?: AdbServerAddress;
  logger?: Logger;
}

// Characters the device shell would otherwise interpret
const SHELL_METACHARACTERS = /[\\'"`|&;<>()$*?[\]{}~#!]/g;

export function escapeShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Encode text for `input text`: metacharacters are backslash-escaped, spaces become %s.
 * `input text` has no escape for a literal "%s", which it always types as a space;
 * callers route such text elsewhere (see `inputTextLimitation`). A "%" before any
 * other character, including an encoded space, is typed as it is.
 */
export function encodeAdbInputText(value: string): string {
  return value.replace(SHELL_METACHARACTERS, '\\$&').replace(/ /g, '%s');
}

/**
 * Split text into pieces of at most `size` characters.
 * Splitting happens before encoding so no escape sequence is ever cut in half.
 */
export function chunkText(value: string, size: number): string[] {
  const characters = Array.from(value);
  const chunks: string[] = [];
  for (let i = 0; i < characters.length; i += size) {
    chunks.push(characters.slice(i, i + size).join(''));
  }
  return chunks;
}

/**
 * Handle on the adb client binary and the bridge server it talks to.
 */
export class AdbBridge {
  readonly adbPath: string;
  private readonly server: AdbServerAddress;
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    options: AdbBridgeOptions = {}
  ) {
    this.adbPath = options.adbPath ?? 'adb';
    this.server = options.server ?? {};
    this.logger = options.logger ?? silentLogger;
  }

  private baseArgs(): string[] {
    const args: string[] = [];
    if (this.server.host) {
      args.push('-H', this.server.host);
    }
    if (this.server.port !== undefined) {
      args.push('-P', String(this.server.port));
    }
    return args;
  }

  // Run adb and return the raw result, whatever the exit status
  async exec(args: string[], options?: RunOptions): Promise<CommandResult> {
    return this.runner.run(this.adbPath, [...this.baseArgs(), ...args], options);
  }

  // Run adb; a nonzero exit status is an error carrying adb's diagnostic text
  async execBinary(args: string[], options?: RunOptions): Promise<Buffer> {
    const result = await this.exec(args, options);
    if (result.exitCode !== 0) {
      const diagnostic = result.stderr.trim() || result.stdout.toString('utf-8').trim();
      const command = describeCommand('adb', args);
      this.logger.debug('adb command failed', { command, exitCode: result.exitCode, diagnostic });
      throw new SubprocessError(command, diagnostic || `exit status ${result.exitCode}`, {
        exitCode: result.exitCode,
      });
    }
    return result.stdout;
  }

  async execText(args: string[], options?: RunOptions): Promise<string> {
    const output = await this.execBinary(args, options);
    return output.toString('utf-8');
  }

  async devices(): Promise<string> {
    return this.execText(['devices', '-l']);
  }

  async shell(serial: string, command: string[], options?: RunOptions): Promise<string> {
    return this.execText(['-s', serial, 'shell', ...command], options);
  }

  async execOut(serial: string, command: string[], options?: RunOptions): Promise<Buffer> {
    return this.execBinary(['-s', serial, 'exec-out', ...command], options);
  }
}
