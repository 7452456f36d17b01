import { execFile } from 'child_process';
import { SubprocessError, ToolNotInstalledError } from '../types';
import { Logger, silentLogger } from './logger';

const DEFAULT_MAX_BUFFER = 50 * 1024 * 1024;

export interface RunOptions {
  timeoutMs?: number;
  input?: string | Buffer;
}

export interface CommandResult {
  stdout: Buffer;
  stderr: string;
  exitCode: number;
}

/**
 * Runs an external program. Resolves with its output and exit status;
 * rejects only when the program could not be run to completion.
 */
export interface CommandRunner {
  run(file: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

const INSTALL_HINTS: Record<string, string> = {
  adb: 'Install Android SDK Platform Tools and ensure adb is in your PATH, or set MOBILE_DEVICE_MCP_ADB_PATH',
  xcrun: 'Install Xcode and its command line tools (xcode-select --install)',
  idevicescreenshot: 'Install libimobiledevice (brew install libimobiledevice)',
  idevice_id: 'Install libimobiledevice (brew install libimobiledevice)',
};

export function describeCommand(file: string, args: string[]): string {
  return [file, ...args].join(' ');
}

export class ExecFileRunner implements CommandRunner {
  constructor(
    private readonly defaultTimeoutMs: number,
    private readonly logger: Logger = silentLogger
  ) {}

  run(file: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;
    const command = describeCommand(file, args);
    this.logger.debug('exec', { command, timeoutMs: timeout });

    return new Promise<CommandResult>((resolve, reject) => {
      const child = execFile(
        file,
        args,
        { encoding: 'buffer', timeout, maxBuffer: DEFAULT_MAX_BUFFER, windowsHide: true },
        (error, stdout, stderr) => {
          const stderrText = stderr.toString('utf-8');
          if (!error) {
            resolve({ stdout, stderr: stderrText, exitCode: 0 });
            return;
          }

          if (error.code === 'ENOENT') {
            const base = file.split(/[\\/]/).pop() ?? file;
            reject(new ToolNotInstalledError(file, INSTALL_HINTS[base] ?? `Install ${file} and ensure it is in your PATH`));
            return;
          }

          if (error.killed || error.signal) {
            reject(
              new SubprocessError(
                command,
                error.killed ? `timed out after ${timeout}ms` : `terminated by ${error.signal}`,
                { timeoutMs: timeout }
              )
            );
            return;
          }

          if (typeof error.code === 'number') {
            resolve({ stdout, stderr: stderrText, exitCode: error.code });
            return;
          }

          reject(new SubprocessError(command, error.message));
        }
      );

      if (options.input !== undefined && child.stdin) {
        // A program that exits early closes its stdin; the exit status reports that failure
        child.stdin.on('error', streamError => {
          this.logger.debug('stdin write failed', { command, error: streamError.message });
        });
        child.stdin.end(options.input);
      }
    });
  }
}
