import {
  AmbiguousDeviceError,
  Button,
  Device,
  DeviceNotFoundError,
  DeviceUnavailableError,
  ElementListing,
  GestureOutcome,
  InstalledApp,
  Operation,
  Orientation,
  Platform,
  PlatformSelector,
  ScreenSize,
  UnsupportedOperationError,
} from '../types';
import { Logger, silentLogger } from '../utils/logger';
import { filterElements } from '../utils/parsers';
import { AndroidDriver } from './android';
import { DeviceDriver, Point } from './driver';
import { IosDriver } from './ios';

export type PlatformBinding =
  | { platform: 'android'; driver: AndroidDriver }
  | { platform: 'ios'; driver: IosDriver };

export interface DeviceRef {
  device_id: string;
  platform?: PlatformSelector;
}

export interface Target {
  binding: PlatformBinding;
  device: Device;
}

export interface DiscoveryFailure {
  platform: Platform;
  message: string;
}

export interface Discovery {
  devices: Device[];
  failures: DiscoveryFailure[];
}

export interface DeviceManagerOptions {
  android: AndroidDriver;
  ios: IosDriver;
  defaultPlatform?: PlatformSelector;
  logger?: Logger;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves (platform, device id) pairs to a driver and a device, fresh on every call.
 */
export class DeviceManager {
  private readonly android: AndroidDriver;
  private readonly ios: IosDriver;
  private readonly defaultPlatform: PlatformSelector;
  private readonly logger: Logger;

  constructor(options: DeviceManagerOptions) {
    this.android = options.android;
    this.ios = options.ios;
    this.defaultPlatform = options.defaultPlatform ?? 'auto';
    this.logger = options.logger ?? silentLogger;
  }

  private binding(platform: Platform): PlatformBinding {
    switch (platform) {
      case 'android':
        return { platform, driver: this.android };
      case 'ios':
        return { platform, driver: this.ios };
    }
  }

  // Auto resolution consults Android before iOS
  private allBindings(): PlatformBinding[] {
    return [this.binding('android'), this.binding('ios')];
  }

  private selected(selector?: PlatformSelector): PlatformBinding[] {
    const platform = selector ?? this.defaultPlatform;
    return platform === 'auto' ? this.allBindings() : [this.binding(platform)];
  }

  /**
   * List devices. A platform whose discovery fails is recorded in `failures`,
   * whether it was selected alone or with the others, and listing never throws.
   */
  async listDevices(selector?: PlatformSelector): Promise<Discovery> {
    const discovery: Discovery = { devices: [], failures: [] };
    for (const { platform, driver } of this.selected(selector)) {
      try {
        discovery.devices.push(...(await driver.listDevices()));
      } catch (error) {
        this.logger.warn(`${platform} discovery failed`, { error: messageOf(error) });
        discovery.failures.push({ platform, message: messageOf(error) });
      }
    }
    return discovery;
  }

  async resolve(ref: DeviceRef, operation: Operation): Promise<Target> {
    const selector = ref.platform ?? this.defaultPlatform;
    const target =
      selector === 'auto' ? await this.resolveAuto(ref.device_id) : await this.resolveOn(selector, ref.device_id);

    const { binding, device } = target;
    const driver: DeviceDriver = binding.driver;
    if (!driver.supports(device.kind, operation)) {
      throw new UnsupportedOperationError(operation, binding.platform, device.kind);
    }
    const reason = driver.unavailableReason(device);
    if (reason) {
      throw new DeviceUnavailableError(device, reason);
    }

    this.logger.debug('resolved device', { operation, platform: binding.platform, deviceId: device.id });
    return target;
  }

  private async resolveOn(platform: Platform, deviceId: string): Promise<Target> {
    const binding = this.binding(platform);
    const device = (await binding.driver.listDevices()).find(candidate => candidate.id === deviceId);
    if (!device) {
      throw new DeviceNotFoundError(deviceId, platform);
    }
    return { binding, device };
  }

  private async resolveAuto(deviceId: string): Promise<Target> {
    const matches: Target[] = [];
    for (const binding of this.allBindings()) {
      let devices: Device[];
      try {
        devices = await binding.driver.listDevices();
      } catch (error) {
        // A platform that cannot list devices cannot own this id
        this.logger.debug(`${binding.platform} discovery failed during resolution`, { error: messageOf(error) });
        continue;
      }
      const device = devices.find(candidate => candidate.id === deviceId);
      if (device) {
        matches.push({ binding, device });
      }
    }

    if (matches.length === 0) {
      throw new DeviceNotFoundError(deviceId, 'auto');
    }
    if (matches.length > 1) {
      throw new AmbiguousDeviceError(deviceId);
    }
    return matches[0];
  }

  private async dispatch<T>(
    ref: DeviceRef,
    operation: Operation,
    run: (driver: DeviceDriver, device: Device) => Promise<T>
  ): Promise<{ device: Device; result: T }> {
    const { binding, device } = await this.resolve(ref, operation);
    const result = await run(binding.driver, device);
    return { device, result };
  }

  screenSize(ref: DeviceRef): Promise<{ device: Device; result: ScreenSize }> {
    return this.dispatch(ref, 'get_screen_size', (driver, device) => driver.screenSize(device));
  }

  orientation(ref: DeviceRef): Promise<{ device: Device; result: Orientation }> {
    return this.dispatch(ref, 'get_orientation', (driver, device) => driver.orientation(device));
  }

  listApps(ref: DeviceRef): Promise<{ device: Device; result: InstalledApp[] }> {
    return this.dispatch(ref, 'list_apps', (driver, device) => driver.listApps(device));
  }

  listElements(ref: DeviceRef, filter?: string): Promise<{ device: Device; result: ElementListing }> {
    return this.dispatch(ref, 'list_elements_on_screen', async (driver, device) => {
      const listing = await driver.listElements(device);
      return { ...listing, elements: filterElements(listing.elements, filter) };
    });
  }

  screenshot(ref: DeviceRef, operation: 'take_screenshot' | 'save_screenshot'): Promise<{ device: Device; result: Buffer }> {
    return this.dispatch(ref, operation, (driver, device) => driver.screenshot(device));
  }

  tap(ref: DeviceRef, point: Point): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'click_on_screen_at_coordinates', (driver, device) => driver.tap(device, point));
  }

  doubleTap(ref: DeviceRef, point: Point): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'double_tap_on_screen', (driver, device) => driver.doubleTap(device, point));
  }

  longPress(ref: DeviceRef, point: Point, durationMs: number): Promise<{ device: Device; result: GestureOutcome }> {
    return this.dispatch(ref, 'long_press_on_screen_at_coordinates', (driver, device) =>
      driver.longPress(device, point, durationMs)
    );
  }

  swipe(ref: DeviceRef, start: Point, end: Point, durationMs: number): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'swipe_on_screen', (driver, device) => driver.swipe(device, start, end, durationMs));
  }

  typeText(ref: DeviceRef, text: string): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'type_keys', (driver, device) => driver.typeText(device, text));
  }

  pressButton(ref: DeviceRef, button: Button): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'press_button', (driver, device) => driver.pressButton(device, button));
  }

  launchApp(ref: DeviceRef, appId: string): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'launch_app', (driver, device) => driver.launchApp(device, appId));
  }

  terminateApp(ref: DeviceRef, appId: string): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'terminate_app', (driver, device) => driver.terminateApp(device, appId));
  }

  installApp(ref: DeviceRef, appPath: string): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'install_app', (driver, device) => driver.installApp(device, appPath));
  }

  uninstallApp(ref: DeviceRef, appId: string): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'uninstall_app', (driver, device) => driver.uninstallApp(device, appId));
  }

  openUrl(ref: DeviceRef, url: string): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'open_url', (driver, device) => driver.openUrl(device, url));
  }

  setOrientation(ref: DeviceRef, orientation: Orientation): Promise<{ device: Device; result: void }> {
    return this.dispatch(ref, 'set_orientation', (driver, device) => driver.setOrientation(device, orientation));
  }
}
