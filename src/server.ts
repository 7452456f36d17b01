import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import pkg from '../package.json';
import { ServerConfig, loadConfig } from './config';
import { AndroidDriver } from './devices/android';
import { IosDriver } from './devices/ios';
import { DeviceManager } from './devices/manager';
import { ToolRegistry } from './tools/registry';
import { LineTransport } from './transport';
import { AdbBridge } from './utils/adb';
import { toToolCallError } from './utils/error';
import { Logger } from './utils/logger';
import { CommandRunner, ExecFileRunner } from './utils/runner';

export const SERVER_NAME = 'mobile-device-mcp';

export interface MobileDeviceServerOptions {
  config?: ServerConfig;
  logger?: Logger;
  // Substitutes for the real subprocess layer or drivers, e.g. in tests
  runner?: CommandRunner;
  devices?: DeviceManager;
}

export function createDeviceManager(config: ServerConfig, runner: CommandRunner, logger: Logger): DeviceManager {
  const adb = new AdbBridge(runner, {
    adbPath: config.adbPath,
    server: { host: config.adbServerHost, port: config.adbServerPort },
    logger,
  });

  return new DeviceManager({
    android: new AndroidDriver(adb, {
      uiDumpPolicy: config.uiDumpPolicy,
      installTimeoutMs: config.installTimeoutMs,
      logger,
    }),
    ios: new IosDriver(runner, { installTimeoutMs: config.installTimeoutMs, logger }),
    defaultPlatform: config.defaultPlatform,
    logger,
  });
}

class MobileDeviceServer {
  private server: Server;
  private registry: ToolRegistry;
  private logger: Logger;

  constructor(options: MobileDeviceServerOptions = {}) {
    const config = options.config ?? loadConfig();
    this.logger = options.logger ?? new Logger(config.debug ? 'debug' : 'info');

    const runner = options.runner ?? new ExecFileRunner(config.commandTimeoutMs, this.logger);
    const devices = options.devices ?? createDeviceManager(config, runner, this.logger);
    this.registry = new ToolRegistry(devices);

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: pkg.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
    this.server.onerror = error => this.logger.error('Protocol error', { error: error.message });
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.registry.list(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      this.logger.debug('Tool call', { name });

      try {
        return await this.registry.call(name, args ?? {});
      } catch (error) {
        const mapped = toToolCallError(error, name);
        this.logger.debug('Tool call failed', { name, code: mapped.code, message: mapped.message });
        throw mapped;
      }
    });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  async run(): Promise<void> {
    const transport = new LineTransport(process.stdin, process.stdout, this.logger);
    await this.connect(transport);
    this.logger.info(`${SERVER_NAME} ${pkg.version} serving on stdio`);
  }
}

// Export the server class
export { MobileDeviceServer };
