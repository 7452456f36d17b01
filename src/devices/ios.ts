import { randomUUID } from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  Button,
  Device,
  DeviceKind,
  ElementListing,
  GestureOutcome,
  InstalledApp,
  Operation,
  Orientation,
  ScreenSize,
  SubprocessError,
  ToolNotInstalledError,
  UnsupportedHostError,
  UnsupportedOperationError,
  ValidationError,
} from '../types';
import { Logger, silentLogger } from '../utils/logger';
import { parseIdeviceIds, parseSimctlApps, parseSimctlDevices } from '../utils/parsers';
import { CommandRunner, RunOptions, describeCommand } from '../utils/runner';
import { assertPng } from '../utils/screenshot';
import { DOUBLE_TAP_DELAY_MS, DeviceDriver, Point, sleep } from './driver';
import screenTable from './ios-screens.json';

// simctl has no query for these
const SIMULATOR_GAPS: ReadonlySet<Operation> = new Set<Operation>([
  'get_orientation',
  'list_elements_on_screen',
]);

// Physical devices are reached through libimobiledevice, which only captures the screen
const PHYSICAL_OPERATIONS: ReadonlySet<Operation> = new Set<Operation>(['take_screenshot', 'save_screenshot']);

const SIMCTL_BUTTONS: Partial<Record<Button, string>> = {
  home: 'home',
  power: 'power',
  volume_up: 'volumeUp',
  volume_down: 'volumeDown',
};

export interface IosDriverOptions {
  // Defaults to the platform this process runs on
  hostPlatform?: NodeJS.Platform;
  installTimeoutMs?: number;
  logger?: Logger;
}

function round(value: number): string {
  return String(Math.round(value));
}

export function lookupScreen(model: string): NonNullable<ScreenSize['estimated']> {
  const entry = screenTable.models.find(candidate => model.includes(candidate.match));
  const { width, height, scale } = entry ?? screenTable.default;
  return { points: { width, height }, scale, model: entry?.match ?? 'default' };
}

export class IosDriver implements DeviceDriver {
  private readonly hostPlatform: NodeJS.Platform;
  private readonly installTimeoutMs?: number;
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    options: IosDriverOptions = {}
  ) {
    this.hostPlatform = options.hostPlatform ?? process.platform;
    this.installTimeoutMs = options.installTimeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  private async simctl(args: string[], options?: RunOptions): Promise<Buffer> {
    return this.checked('xcrun', ['simctl', ...args], options);
  }

  private async checked(file: string, args: string[], options?: RunOptions): Promise<Buffer> {
    const result = await this.runner.run(file, args, options);
    if (result.exitCode !== 0) {
      const diagnostic = result.stderr.trim() || result.stdout.toString('utf-8').trim();
      throw new SubprocessError(describeCommand(file, args), diagnostic || `exit status ${result.exitCode}`, {
        exitCode: result.exitCode,
      });
    }
    return result.stdout;
  }

  private async io(device: Device, args: string[]): Promise<void> {
    await this.simctl(['io', device.id, ...args]);
  }

  async listDevices(): Promise<Device[]> {
    if (this.hostPlatform !== 'darwin') {
      throw new UnsupportedHostError('ios', 'macOS', this.hostPlatform);
    }

    const simulators = parseSimctlDevices(
      (await this.simctl(['list', 'devices', 'available', '--json'])).toString('utf-8')
    );
    return [...simulators, ...(await this.listPhysicalDevices())];
  }

  private async listPhysicalDevices(): Promise<Device[]> {
    try {
      return parseIdeviceIds((await this.checked('idevice_id', ['-l'])).toString('utf-8'));
    } catch (error) {
      if (error instanceof ToolNotInstalledError) {
        this.logger.debug('idevice_id not installed, skipping physical iOS devices');
        return [];
      }
      throw error;
    }
  }

  supports(kind: DeviceKind, operation: Operation): boolean {
    if (kind === 'physical') {
      return PHYSICAL_OPERATIONS.has(operation);
    }
    return !SIMULATOR_GAPS.has(operation);
  }

  unavailableReason(device: Device): string | undefined {
    if (device.kind === 'simulator' && device.state !== 'booted') {
      return `Boot the simulator first (xcrun simctl boot ${device.id})`;
    }
    return undefined;
  }

  async screenshot(device: Device): Promise<Buffer> {
    if (device.kind === 'physical') {
      return this.physicalScreenshot(device);
    }
    const data = await this.simctl(['io', device.id, 'screenshot', '--type=png', '-']);
    return assertPng(data, 'simctl');
  }

  private async physicalScreenshot(device: Device): Promise<Buffer> {
    const target = path.join(os.tmpdir(), `mobile-device-mcp-${randomUUID()}.png`);
    try {
      await this.checked('idevicescreenshot', ['-u', device.id, target]);
      return assertPng(await fs.promises.readFile(target), 'idevicescreenshot');
    } finally {
      await fs.promises.rm(target, { force: true });
    }
  }

  // Not a live query: simctl does not report pixel geometry
  async screenSize(device: Device): Promise<ScreenSize> {
    const estimated = lookupScreen(device.model ?? device.display_name);
    return {
      width: estimated.points.width * estimated.scale,
      height: estimated.points.height * estimated.scale,
      estimated,
    };
  }

  async orientation(device: Device): Promise<Orientation> {
    throw new UnsupportedOperationError('get_orientation', 'ios', device.kind, 'simctl cannot read the orientation');
  }

  async setOrientation(device: Device, orientation: Orientation): Promise<void> {
    await this.io(device, ['orientation', orientation]);
  }

  async listApps(device: Device): Promise<InstalledApp[]> {
    const plist = await this.simctl(['listapps', device.id]);
    const json = await this.checked('plutil', ['-convert', 'json', '-o', '-', '-'], { input: plist });
    return parseSimctlApps(json.toString('utf-8'));
  }

  async listElements(device: Device): Promise<ElementListing> {
    throw new UnsupportedOperationError(
      'list_elements_on_screen',
      'ios',
      device.kind,
      'simctl cannot dump the view hierarchy'
    );
  }

  async tap(device: Device, point: Point): Promise<void> {
    await this.io(device, ['tap', round(point.x), round(point.y)]);
  }

  async doubleTap(device: Device, point: Point): Promise<void> {
    await this.tap(device, point);
    await sleep(DOUBLE_TAP_DELAY_MS);
    await this.tap(device, point);
  }

  // simctl cannot hold a touch, so the press becomes a tap and says so
  async longPress(device: Device, point: Point, durationMs: number): Promise<GestureOutcome> {
    await this.tap(device, point);
    return {
      degraded: `performed as a single tap; the iOS simulator has no long press, so the requested ${durationMs}ms duration was not honored`,
    };
  }

  // simctl picks its own swipe speed
  async swipe(device: Device, start: Point, end: Point): Promise<void> {
    await this.io(device, ['swipe', round(start.x), round(start.y), round(end.x), round(end.y)]);
  }

  async typeText(device: Device, text: string): Promise<void> {
    await this.io(device, ['type', text]);
  }

  async pressButton(device: Device, button: Button): Promise<void> {
    const name = SIMCTL_BUTTONS[button];
    if (!name) {
      throw new UnsupportedOperationError(`press_button ${button}`, 'ios', device.kind);
    }
    await this.io(device, ['press', name]);
  }

  async launchApp(device: Device, appId: string): Promise<void> {
    await this.simctl(['launch', device.id, appId]);
  }

  async terminateApp(device: Device, appId: string): Promise<void> {
    await this.simctl(['terminate', device.id, appId]);
  }

  async installApp(device: Device, appPath: string): Promise<void> {
    if (!fs.existsSync(appPath)) {
      throw new ValidationError(`App bundle not found: ${appPath}`, { app_path: appPath });
    }
    await this.simctl(['install', device.id, appPath], { timeoutMs: this.installTimeoutMs });
  }

  async uninstallApp(device: Device, appId: string): Promise<void> {
    await this.simctl(['uninstall', device.id, appId]);
  }

  async openUrl(device: Device, url: string): Promise<void> {
    await this.simctl(['openurl', device.id, url]);
  }
}
