import type { UiDumpPolicy } from '../config';
import {
  Button,
  Device,
  ElementListing,
  GestureOutcome,
  InstalledApp,
  Orientation,
  ScreenSize,
  SubprocessError,
  UnsupportedOperationError,
} from '../types';
import { AdbBridge, chunkText, encodeAdbInputText, escapeShellArg } from '../utils/adb';
import { Logger, silentLogger } from '../utils/logger';
import {
  countDisplays,
  parseActiveDisplayId,
  parseAdbDeviceList,
  parseLauncherPackages,
  parseResolvedActivity,
  parseRotation,
  parseUiHierarchy,
  parseViewportDisplayId,
  parseWindowSize,
} from '../utils/parsers';
import { assertPng } from '../utils/screenshot';
import { DOUBLE_TAP_DELAY_MS, DeviceDriver, Point, sleep } from './driver';

export const KEY_CODES: Record<Button, number> = {
  home: 3,
  back: 4,
  menu: 82,
  power: 26,
  volume_up: 24,
  volume_down: 25,
  camera: 27,
  enter: 66,
  search: 84,
  app_switch: 187,
  delete: 67,
  dpad_up: 19,
  dpad_down: 20,
  dpad_left: 21,
  dpad_right: 22,
  dpad_center: 23,
};

const LAUNCHER_CATEGORY = 'android.intent.category.LAUNCHER';
const UI_DUMP_PATH = '/sdcard/mobile_device_mcp_ui.xml';
const TEXT_CHUNK_SIZE = 80;
const KEYCODE_TAB = 61;
const KEYCODE_PASTE = 279;

const DEVICE_KIT_PACKAGE = 'com.mobilenext.devicekit';
const DEVICE_KIT_RECEIVER = `${DEVICE_KIT_PACKAGE}/.ClipboardBroadcastReceiver`;

/**
 * Why `input text` cannot type this text, if it cannot. It only types printable
 * ASCII, and it turns every "%s" into a space, so a literal "%s" would be lost.
 */
export function inputTextLimitation(text: string): string | undefined {
  if (/[^\x20-\x7e\t\r\n]/.test(text)) {
    return 'adb input text only types printable ASCII characters';
  }
  if (text.includes('%s')) {
    return 'adb input text types "%s" as a space';
  }
  return undefined;
}

export interface AndroidDriverOptions {
  uiDumpPolicy?: UiDumpPolicy;
  installTimeoutMs?: number;
  logger?: Logger;
}

function coordinate(value: number): string {
  return String(Math.round(value));
}

export class AndroidDriver implements DeviceDriver {
  private readonly uiDumpPolicy: UiDumpPolicy;
  private readonly installTimeoutMs?: number;
  private readonly logger: Logger;

  constructor(
    private readonly adb: AdbBridge,
    options: AndroidDriverOptions = {}
  ) {
    this.uiDumpPolicy = options.uiDumpPolicy ?? 'strict';
    this.installTimeoutMs = options.installTimeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  async listDevices(): Promise<Device[]> {
    return parseAdbDeviceList(await this.adb.devices());
  }

  // Emulators and physical devices accept the same commands
  supports(): boolean {
    return true;
  }

  unavailableReason(device: Device): string | undefined {
    switch (device.state) {
      case 'device':
        return undefined;
      case 'unauthorized':
        return 'Accept the USB debugging prompt on the device';
      case 'offline':
        return 'Reconnect the device or restart the adb server (adb kill-server)';
      default:
        return 'Wait until adb reports the device in state "device"';
    }
  }

  async screenshot(device: Device): Promise<Buffer> {
    const displayId = await this.activeDisplayId(device);
    const command = displayId === undefined ? ['screencap', '-p'] : ['screencap', '-p', '-d', displayId];
    return assertPng(await this.adb.execOut(device.id, command), 'screencap');
  }

  /**
   * The display to capture on devices with more than one (foldables, external screens).
   * Undefined means screencap's default display.
   */
  private async activeDisplayId(device: Device): Promise<string | undefined> {
    const surfaces = await this.adb.shell(device.id, ['dumpsys', 'SurfaceFlinger', '--display-id']);
    if (countDisplays(surfaces) <= 1) {
      return undefined;
    }

    const displays = await this.adb.exec(['-s', device.id, 'shell', 'cmd', 'display', 'get-displays']);
    const active = displays.exitCode === 0 ? parseActiveDisplayId(displays.stdout.toString('utf-8')) : undefined;
    if (active !== undefined) {
      return active;
    }

    const viewports = await this.adb.exec(['-s', device.id, 'shell', 'dumpsys', 'display']);
    const viewport = viewports.exitCode === 0 ? parseViewportDisplayId(viewports.stdout.toString('utf-8')) : undefined;
    if (viewport === undefined) {
      this.logger.warn('No active display found, capturing the default display', { deviceId: device.id });
    }
    return viewport;
  }

  async screenSize(device: Device): Promise<ScreenSize> {
    return parseWindowSize(await this.adb.shell(device.id, ['wm', 'size']));
  }

  async orientation(device: Device): Promise<Orientation> {
    return parseRotation(await this.adb.shell(device.id, ['settings', 'get', 'system', 'user_rotation']));
  }

  // Locks auto-rotation first, otherwise the sensor overrides the requested rotation
  async setOrientation(device: Device, orientation: Orientation): Promise<void> {
    await this.adb.shell(device.id, ['settings', 'put', 'system', 'accelerometer_rotation', '0']);
    await this.adb.shell(device.id, [
      'settings',
      'put',
      'system',
      'user_rotation',
      orientation === 'portrait' ? '0' : '1',
    ]);
  }

  async listApps(device: Device): Promise<InstalledApp[]> {
    const output = await this.adb.shell(device.id, [
      'cmd',
      'package',
      'query-activities',
      '-a',
      'android.intent.action.MAIN',
      '-c',
      LAUNCHER_CATEGORY,
    ]);
    return parseLauncherPackages(output).map(id => ({ id, name: id }));
  }

  async listElements(device: Device): Promise<ElementListing> {
    const dumpOutput = await this.adb.shell(device.id, ['uiautomator', 'dump', UI_DUMP_PATH]);
    if (/error/i.test(dumpOutput)) {
      throw new SubprocessError('adb shell uiautomator dump', dumpOutput.trim());
    }

    try {
      const xml = (await this.adb.execOut(device.id, ['cat', UI_DUMP_PATH])).toString('utf-8');
      return parseUiHierarchy(xml, this.uiDumpPolicy);
    } finally {
      await this.removeDumpFile(device);
    }
  }

  private async removeDumpFile(device: Device): Promise<void> {
    const result = await this.adb.exec(['-s', device.id, 'shell', 'rm', '-f', UI_DUMP_PATH]);
    if (result.exitCode !== 0) {
      this.logger.warn('Failed to remove UI dump from device', {
        deviceId: device.id,
        stderr: result.stderr.trim(),
      });
    }
  }

  async tap(device: Device, point: Point): Promise<void> {
    await this.adb.shell(device.id, ['input', 'tap', coordinate(point.x), coordinate(point.y)]);
  }

  async doubleTap(device: Device, point: Point): Promise<void> {
    await this.tap(device, point);
    await sleep(DOUBLE_TAP_DELAY_MS);
    await this.tap(device, point);
  }

  // A swipe that starts and ends on the same point holds the touch for its duration
  async longPress(device: Device, point: Point, durationMs: number): Promise<GestureOutcome> {
    await this.swipe(device, point, point, durationMs);
    return {};
  }

  async swipe(device: Device, start: Point, end: Point, durationMs: number): Promise<void> {
    await this.adb.shell(device.id, [
      'input',
      'swipe',
      coordinate(start.x),
      coordinate(start.y),
      coordinate(end.x),
      coordinate(end.y),
      String(Math.round(durationMs)),
    ]);
  }

  async typeText(device: Device, text: string): Promise<void> {
    const unsupported = inputTextLimitation(text);
    if (!unsupported) {
      await this.typeWithInputText(device, text);
      return;
    }

    if (!(await this.hasDeviceKit(device))) {
      throw new UnsupportedOperationError(
        'type_keys',
        'android',
        device.kind,
        `${unsupported}; install DeviceKit (${DEVICE_KIT_PACKAGE}) to type such text through the clipboard`
      );
    }
    this.logger.debug('typing through the DeviceKit clipboard', { deviceId: device.id });
    await this.pasteWithDeviceKit(device, text);
  }

  // Newlines become ENTER and tabs become TAB, everything else goes through `input text`
  private async typeWithInputText(device: Device, text: string): Promise<void> {
    for (const part of text.split(/(\r\n|\r|\n|\t)/)) {
      if (part === '\t') {
        await this.adb.shell(device.id, ['input', 'keyevent', String(KEYCODE_TAB)]);
      } else if (part === '\n' || part === '\r' || part === '\r\n') {
        await this.pressButton(device, 'enter');
      } else {
        for (const chunk of chunkText(part, TEXT_CHUNK_SIZE)) {
          await this.adb.shell(device.id, ['input', 'text', encodeAdbInputText(chunk)]);
        }
      }
    }
  }

  private async hasDeviceKit(device: Device): Promise<boolean> {
    const output = await this.adb.shell(device.id, ['pm', 'list', 'packages', DEVICE_KIT_PACKAGE]);
    return output.split(/\r?\n/).some(line => line.trim() === `package:${DEVICE_KIT_PACKAGE}`);
  }

  // The clipboard is cleared again even when the paste fails
  private async pasteWithDeviceKit(device: Device, text: string): Promise<void> {
    await this.adb.shell(device.id, [
      'am',
      'broadcast',
      '-a',
      'devicekit.clipboard.set',
      '-e',
      'encoding',
      'base64',
      '-e',
      'text',
      Buffer.from(text, 'utf-8').toString('base64'),
      '-n',
      DEVICE_KIT_RECEIVER,
    ]);
    try {
      await this.adb.shell(device.id, ['input', 'keyevent', String(KEYCODE_PASTE)]);
    } finally {
      await this.adb.shell(device.id, ['am', 'broadcast', '-a', 'devicekit.clipboard.clear', '-n', DEVICE_KIT_RECEIVER]);
    }
  }

  async pressButton(device: Device, button: Button): Promise<void> {
    await this.adb.shell(device.id, ['input', 'keyevent', String(KEY_CODES[button])]);
  }

  async launchApp(device: Device, appId: string): Promise<void> {
    const monkey = await this.adb.exec([
      '-s',
      device.id,
      'shell',
      'monkey',
      '-p',
      appId,
      '-c',
      LAUNCHER_CATEGORY,
      '1',
    ]);
    const monkeyOutput = `${monkey.stdout.toString('utf-8')}\n${monkey.stderr}`;
    if (monkey.exitCode === 0 && !/monkey aborted|No activities found/i.test(monkeyOutput)) {
      return;
    }

    this.logger.debug('monkey launch failed, resolving launcher activity', { appId });
    const resolved = await this.adb.shell(device.id, [
      'cmd',
      'package',
      'resolve-activity',
      '--brief',
      '-a',
      'android.intent.action.MAIN',
      '-c',
      LAUNCHER_CATEGORY,
      appId,
    ]);
    const component = parseResolvedActivity(resolved, appId);
    if (!component) {
      throw new SubprocessError(`launch ${appId}`, `no launcher activity found (${monkeyOutput.trim()})`);
    }

    const output = await this.adb.shell(device.id, ['am', 'start', '-n', component]);
    if (/^Error/m.test(output)) {
      throw new SubprocessError(`am start -n ${component}`, output.trim());
    }
  }

  async terminateApp(device: Device, appId: string): Promise<void> {
    await this.adb.shell(device.id, ['am', 'force-stop', appId]);
  }

  // The path goes to adb unchanged; relative paths resolve against this process's working directory
  async installApp(device: Device, appPath: string): Promise<void> {
    const output = await this.adb.execText(['-s', device.id, 'install', '-r', appPath], {
      timeoutMs: this.installTimeoutMs,
    });
    if (!output.includes('Success')) {
      throw new SubprocessError('adb install', output.trim());
    }
  }

  async uninstallApp(device: Device, appId: string): Promise<void> {
    const output = await this.adb.execText(['-s', device.id, 'uninstall', appId]);
    if (!output.includes('Success')) {
      throw new SubprocessError('adb uninstall', output.trim());
    }
  }

  async openUrl(device: Device, url: string): Promise<void> {
    const output = await this.adb.shell(device.id, [
      'am',
      'start',
      '-a',
      'android.intent.action.VIEW',
      '-d',
      escapeShellArg(url),
    ]);
    if (/^Error/m.test(output)) {
      throw new SubprocessError('am start -a android.intent.action.VIEW', output.trim());
    }
  }
}
