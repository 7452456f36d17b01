import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { BUTTONS } from '../types';

// Tool input schemas

const PlatformSchema = z.enum(['android', 'ios', 'auto']).optional();
const DeviceIdSchema = z.string().trim().min(1, 'device_id must not be empty');
const CoordinateSchema = z.number().finite().nonnegative();
const DurationSchema = z.number().int().positive().max(60000);
// Package names and bundle identifiers; also keeps the value inert in a device shell
const AppIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]+$/, 'app_id must be a package name or bundle identifier');

const DeviceArgs = {
  device_id: DeviceIdSchema,
  platform: PlatformSchema,
};

export const ListDevicesInputSchema = z.object({
  platform: PlatformSchema,
});

export const DeviceInputSchema = z.object(DeviceArgs);

export const ListElementsInputSchema = z.object({
  ...DeviceArgs,
  filter: z.string().optional(),
});

export const SaveScreenshotInputSchema = z.object({
  ...DeviceArgs,
  output_path: z.string().trim().min(1, 'output_path must not be empty'),
});

export const PointInputSchema = z.object({
  ...DeviceArgs,
  x: CoordinateSchema,
  y: CoordinateSchema,
});

export const LongPressInputSchema = PointInputSchema.extend({
  duration: DurationSchema.default(1000),
});

export const SwipeInputSchema = z.object({
  ...DeviceArgs,
  start_x: CoordinateSchema,
  start_y: CoordinateSchema,
  end_x: CoordinateSchema,
  end_y: CoordinateSchema,
  duration: DurationSchema.default(300),
});

export const TypeKeysInputSchema = z.object({
  ...DeviceArgs,
  text: z.string().min(1, 'text must not be empty'),
});

export const PressButtonInputSchema = z.object({
  ...DeviceArgs,
  button: z.enum(BUTTONS),
});

export const AppInputSchema = z.object({
  ...DeviceArgs,
  app_id: AppIdSchema,
});

export const InstallAppInputSchema = z.object({
  ...DeviceArgs,
  app_path: z.string().trim().min(1, 'app_path must not be empty'),
});

export const OpenUrlInputSchema = z.object({
  ...DeviceArgs,
  url: z.string().url('url must be absolute and include a scheme, e.g. https:// or myapp://'),
});

export const SetOrientationInputSchema = z.object({
  ...DeviceArgs,
  orientation: z.enum(['portrait', 'landscape']),
});

// MCP tool schemas

type JsonProperties = Record<string, Record<string, unknown>>;

const platformProperty = {
  type: 'string',
  enum: ['android', 'ios', 'auto'],
  description: 'Target platform. "auto" finds the device on Android first, then iOS. Defaults to the server setting.',
};

const deviceProperties: JsonProperties = {
  device_id: {
    type: 'string',
    description: 'Device ID as reported by list_available_devices (adb serial or simulator UDID).',
  },
  platform: platformProperty,
};

function coordinateProperty(description: string): Record<string, unknown> {
  return { type: 'number', minimum: 0, description };
}

function deviceTool(properties: JsonProperties = {}, required: string[] = []): Tool['inputSchema'] {
  return {
    type: 'object' as const,
    properties: { ...deviceProperties, ...properties },
    required: ['device_id', ...required],
  };
}

export const ListDevicesToolSchema: Tool['inputSchema'] = {
  type: 'object' as const,
  properties: { platform: platformProperty },
  required: [] as string[],
};

export const DeviceToolSchema = deviceTool();

export const ListElementsToolSchema = deviceTool({
  filter: {
    type: 'string',
    description: 'Only return elements whose text, resource id or class contains this value (case-insensitive).',
  },
});

export const SaveScreenshotToolSchema = deviceTool(
  {
    output_path: { type: 'string', description: 'File path the PNG screenshot is written to.' },
  },
  ['output_path']
);

export const PointToolSchema = deviceTool(
  {
    x: coordinateProperty('X coordinate in pixels.'),
    y: coordinateProperty('Y coordinate in pixels.'),
  },
  ['x', 'y']
);

export const LongPressToolSchema = deviceTool(
  {
    x: coordinateProperty('X coordinate in pixels.'),
    y: coordinateProperty('Y coordinate in pixels.'),
    duration: {
      type: 'integer',
      minimum: 1,
      maximum: 60000,
      default: 1000,
      description: 'Hold time in milliseconds. iOS simulators perform a tap instead.',
    },
  },
  ['x', 'y']
);

export const SwipeToolSchema = deviceTool(
  {
    start_x: coordinateProperty('Start X coordinate in pixels.'),
    start_y: coordinateProperty('Start Y coordinate in pixels.'),
    end_x: coordinateProperty('End X coordinate in pixels.'),
    end_y: coordinateProperty('End Y coordinate in pixels.'),
    duration: {
      type: 'integer',
      minimum: 1,
      maximum: 60000,
      default: 300,
      description: 'Swipe duration in milliseconds (Android only).',
    },
  },
  ['start_x', 'start_y', 'end_x', 'end_y']
);

export const TypeKeysToolSchema = deviceTool(
  {
    text: { type: 'string', description: 'Text to type into the focused field. Newlines press Enter.' },
  },
  ['text']
);

export const PressButtonToolSchema = deviceTool(
  {
    button: {
      type: 'string',
      enum: [...BUTTONS],
      description: 'Hardware or navigation button. iOS simulators support home, power, volume_up and volume_down.',
    },
  },
  ['button']
);

export const AppToolSchema = deviceTool(
  {
    app_id: { type: 'string', description: 'Android package name or iOS bundle identifier.' },
  },
  ['app_id']
);

export const InstallAppToolSchema = deviceTool(
  {
    app_path: { type: 'string', description: 'Local path to an .apk (Android) or .app bundle (iOS simulator).' },
  },
  ['app_path']
);

export const OpenUrlToolSchema = deviceTool(
  {
    url: { type: 'string', description: 'URL to open, including its scheme (https://, myapp://).' },
  },
  ['url']
);

export const SetOrientationToolSchema = deviceTool(
  {
    orientation: { type: 'string', enum: ['portrait', 'landscape'] },
  },
  ['orientation']
);
