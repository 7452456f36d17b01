export type Platform = 'android' | 'ios';
export type PlatformSelector = Platform | 'auto';
export type DeviceKind = 'physical' | 'emulator' | 'simulator';
export type Orientation = 'portrait' | 'landscape';

// Device information interfaces
export interface Device {
  id: string;
  display_name: string;
  platform: Platform;
  kind: DeviceKind;
  state: string;
  model?: string;
}

export interface ScreenSize {
  width: number;
  height: number;
  // Set when the size comes from a model table instead of the device itself
  estimated?: { points: { width: number; height: number }; scale: number; model: string };
}

export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ScreenElement {
  class_name: string;
  text: string;
  resource_id: string;
  content_desc: string;
  bounds: Bounds;
  clickable: boolean;
  focused: boolean;
}

export interface ElementListing {
  elements: ScreenElement[];
  partial: boolean;
}

export interface InstalledApp {
  id: string;
  name: string;
}

export interface GestureOutcome {
  // Present when the platform could not perform the gesture as requested
  degraded?: string;
}

export type Operation =
  | 'get_screen_size'
  | 'get_orientation'
  | 'list_apps'
  | 'list_elements_on_screen'
  | 'take_screenshot'
  | 'save_screenshot'
  | 'click_on_screen_at_coordinates'
  | 'double_tap_on_screen'
  | 'long_press_on_screen_at_coordinates'
  | 'swipe_on_screen'
  | 'type_keys'
  | 'press_button'
  | 'launch_app'
  | 'terminate_app'
  | 'install_app'
  | 'uninstall_app'
  | 'open_url'
  | 'set_orientation';

export const BUTTONS = [
  'home',
  'back',
  'menu',
  'power',
  'volume_up',
  'volume_down',
  'camera',
  'enter',
  'search',
  'app_switch',
  'delete',
  'dpad_up',
  'dpad_down',
  'dpad_left',
  'dpad_right',
  'dpad_center',
] as const;

export type Button = (typeof BUTTONS)[number];

// Error handling
export type ErrorKind =
  | 'validation'
  | 'device'
  | 'platform_unsupported'
  | 'subprocess'
  | 'io'
  | 'internal';

export const ERROR_CODES: Record<ErrorKind, number> = {
  validation: -32602,
  device: -32001,
  platform_unsupported: -32002,
  subprocess: -32003,
  io: -32004,
  internal: -32603,
};

export class MobileDeviceError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(message);
    this.name = 'MobileDeviceError';
    this.kind = kind;
    this.details = details;
    this.suggestion = suggestion;
  }

  get code(): number {
    return ERROR_CODES[this.kind];
  }
}

export class ValidationError extends MobileDeviceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('validation', message, details);
    this.name = 'ValidationError';
  }
}

export class UnknownToolError extends ValidationError {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, { tool: toolName });
    this.name = 'UnknownToolError';
  }
}

export class DeviceNotFoundError extends MobileDeviceError {
  constructor(deviceId: string, platform: PlatformSelector) {
    super(
      'device',
      platform === 'auto'
        ? `Device with ID '${deviceId}' not found on any platform`
        : `Device with ID '${deviceId}' not found on ${platform}`,
      { deviceId, platform },
      'Call list_available_devices to see the connected devices and their IDs'
    );
    this.name = 'DeviceNotFoundError';
  }
}

export class AmbiguousDeviceError extends MobileDeviceError {
  constructor(deviceId: string) {
    super(
      'device',
      `Device ID '${deviceId}' matches both an Android and an iOS device`,
      { deviceId },
      'Pass platform "android" or "ios" explicitly'
    );
    this.name = 'AmbiguousDeviceError';
  }
}

export class DeviceUnavailableError extends MobileDeviceError {
  constructor(device: Device, suggestion: string) {
    super(
      'device',
      `Device '${device.id}' is not available (state: ${device.state})`,
      { deviceId: device.id, platform: device.platform, state: device.state },
      suggestion
    );
    this.name = 'DeviceUnavailableError';
  }
}

export class UnsupportedOperationError extends MobileDeviceError {
  constructor(operation: string, platform: Platform, kind?: DeviceKind, reason?: string) {
    const target = kind ? `${platform} ${kind}` : platform;
    super(
      'platform_unsupported',
      `${operation} is unsupported on this device kind (${target})${reason ? `: ${reason}` : ''}`,
      { operation, platform, kind }
    );
    this.name = 'UnsupportedOperationError';
  }
}

// The platform's tooling does not exist on the host this server runs on
export class UnsupportedHostError extends MobileDeviceError {
  constructor(platform: Platform, requiredHost: string, host: string) {
    const label = platform === 'ios' ? 'iOS' : 'Android';
    super(
      'platform_unsupported',
      `${label} devices can only be reached from a ${requiredHost} host (this host: ${host})`,
      { platform, host },
      `Run the server on ${requiredHost} to use ${label} devices`
    );
    this.name = 'UnsupportedHostError';
  }
}

export class ToolNotInstalledError extends MobileDeviceError {
  constructor(tool: string, suggestion: string) {
    super('subprocess', `${tool} not found`, { tool }, suggestion);
    this.name = 'ToolNotInstalledError';
  }
}

export class SubprocessError extends MobileDeviceError {
  constructor(command: string, message: string, details?: Record<string, unknown>) {
    super('subprocess', `${command} failed: ${message}`, { command, ...details });
    this.name = 'SubprocessError';
  }
}

export class OutputParseError extends MobileDeviceError {
  constructor(what: string, output: string) {
    super('subprocess', `Unexpected ${what} output: ${output.trim().slice(0, 200) || '(empty)'}`, {
      output,
    });
    this.name = 'OutputParseError';
  }
}

export class OutputWriteError extends MobileDeviceError {
  constructor(filePath: string, reason: string) {
    super('io', `Cannot write '${filePath}': ${reason}`, { path: filePath });
    this.name = 'OutputWriteError';
  }
}
