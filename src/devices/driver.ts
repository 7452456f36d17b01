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
} from '../types';

export interface Point {
  x: number;
  y: number;
}

/**
 * Operations every platform driver offers. A driver declares per device kind
 * which operations it can perform; the device manager checks that before dispatch.
 */
export interface DeviceDriver {
  listDevices(): Promise<Device[]>;
  supports(kind: DeviceKind, operation: Operation): boolean;
  // Reason a listed device cannot take commands right now, if any
  unavailableReason(device: Device): string | undefined;

  screenshot(device: Device): Promise<Buffer>;
  screenSize(device: Device): Promise<ScreenSize>;
  orientation(device: Device): Promise<Orientation>;
  setOrientation(device: Device, orientation: Orientation): Promise<void>;
  listApps(device: Device): Promise<InstalledApp[]>;
  listElements(device: Device): Promise<ElementListing>;

  tap(device: Device, point: Point): Promise<void>;
  doubleTap(device: Device, point: Point): Promise<void>;
  longPress(device: Device, point: Point, durationMs: number): Promise<GestureOutcome>;
  swipe(device: Device, start: Point, end: Point, durationMs: number): Promise<void>;
  typeText(device: Device, text: string): Promise<void>;
  pressButton(device: Device, button: Button): Promise<void>;

  launchApp(device: Device, appId: string): Promise<void>;
  terminateApp(device: Device, appId: string): Promise<void>;
  installApp(device: Device, appPath: string): Promise<void>;
  uninstallApp(device: Device, appId: string): Promise<void>;
  openUrl(device: Device, url: string): Promise<void>;
}

export const DOUBLE_TAP_DELAY_MS = 50;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
