import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { DeviceManager } from '../devices/manager';
import { UnknownToolError, ValidationError } from '../types';
import { formatIssues } from '../utils/error';
import { writeScreenshot } from '../utils/screenshot';
import {
  appsResult,
  describeDevice,
  devicesResult,
  elementsResult,
  imageResult,
  screenSizeResult,
  textResult,
} from './result';
import {
  AppInputSchema,
  AppToolSchema,
  DeviceInputSchema,
  DeviceToolSchema,
  InstallAppInputSchema,
  InstallAppToolSchema,
  ListDevicesInputSchema,
  ListDevicesToolSchema,
  ListElementsInputSchema,
  ListElementsToolSchema,
  LongPressInputSchema,
  LongPressToolSchema,
  OpenUrlInputSchema,
  OpenUrlToolSchema,
  PointInputSchema,
  PointToolSchema,
  PressButtonInputSchema,
  PressButtonToolSchema,
  SaveScreenshotInputSchema,
  SaveScreenshotToolSchema,
  SetOrientationInputSchema,
  SetOrientationToolSchema,
  SwipeInputSchema,
  SwipeToolSchema,
  TypeKeysInputSchema,
  TypeKeysToolSchema,
} from './schemas';

export const TOOL_PREFIX = 'mobile_device_mcp_';

export interface RegisteredTool {
  // Name without the published prefix
  name: string;
  description: string;
  inputSchema: Tool['inputSchema'];
  call(args: unknown, devices: DeviceManager): Promise<CallToolResult>;
}

interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  args: S;
  inputSchema: Tool['inputSchema'];
  handler(args: z.infer<S>, devices: DeviceManager): Promise<CallToolResult>;
}

function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async call(args, devices) {
      const parsed = definition.args.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ValidationError(`Invalid arguments for ${definition.name}: ${formatIssues(parsed.error)}`);
      }
      return definition.handler(parsed.data, devices);
    },
  };
}

// Handlers only translate between arguments, the device manager and result blocks
export const TOOLS: readonly RegisteredTool[] = [
  defineTool({
    name: 'list_available_devices',
    description: 'List connected Android devices and emulators and available iOS simulators.',
    args: ListDevicesInputSchema,
    inputSchema: ListDevicesToolSchema,
    handler: async (args, devices) => devicesResult(await devices.listDevices(args.platform)),
  }),
  defineTool({
    name: 'get_screen_size',
    description: 'Get the screen size of a device in pixels.',
    args: DeviceInputSchema,
    inputSchema: DeviceToolSchema,
    handler: async (args, devices) => screenSizeResult((await devices.screenSize(args)).result),
  }),
  defineTool({
    name: 'get_orientation',
    description: 'Get the current screen orientation (portrait or landscape).',
    args: DeviceInputSchema,
    inputSchema: DeviceToolSchema,
    handler: async (args, devices) => textResult(`Current orientation: ${(await devices.orientation(args)).result}`),
  }),
  defineTool({
    name: 'list_apps',
    description: 'List the apps installed on a device.',
    args: DeviceInputSchema,
    inputSchema: DeviceToolSchema,
    handler: async (args, devices) => appsResult((await devices.listApps(args)).result),
  }),
  defineTool({
    name: 'list_elements_on_screen',
    description: 'List the UI elements on screen with their coordinates (Android).',
    args: ListElementsInputSchema,
    inputSchema: ListElementsToolSchema,
    handler: async (args, devices) => elementsResult((await devices.listElements(args, args.filter)).result),
  }),
  defineTool({
    name: 'take_screenshot',
    description: 'Capture the screen as a PNG image.',
    args: DeviceInputSchema,
    inputSchema: DeviceToolSchema,
    handler: async (args, devices) => imageResult((await devices.screenshot(args, 'take_screenshot')).result),
  }),
  defineTool({
    name: 'save_screenshot',
    description: 'Capture the screen and write the PNG to a file.',
    args: SaveScreenshotInputSchema,
    inputSchema: SaveScreenshotToolSchema,
    handler: async (args, devices) => {
      const { result } = await devices.screenshot(args, 'save_screenshot');
      return textResult(`Screenshot saved to: ${writeScreenshot(args.output_path, result)}`);
    },
  }),
  defineTool({
    name: 'click_on_screen_at_coordinates',
    description: 'Tap the screen at the given coordinates.',
    args: PointInputSchema,
    inputSchema: PointToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.tap(args, args);
      return textResult(`Tapped at (${args.x}, ${args.y}) on ${describeDevice(device)}`);
    },
  }),
  defineTool({
    name: 'double_tap_on_screen',
    description: 'Double-tap the screen at the given coordinates.',
    args: PointInputSchema,
    inputSchema: PointToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.doubleTap(args, args);
      return textResult(`Double-tapped at (${args.x}, ${args.y}) on ${describeDevice(device)}`);
    },
  }),
  defineTool({
    name: 'long_press_on_screen_at_coordinates',
    description: 'Press and hold the screen at the given coordinates.',
    args: LongPressInputSchema,
    inputSchema: LongPressToolSchema,
    handler: async (args, devices) => {
      const { device, result } = await devices.longPress(args, args, args.duration);
      const target = `(${args.x}, ${args.y}) on ${describeDevice(device)}`;
      return textResult(
        result.degraded
          ? `Long press at ${target} ${result.degraded}`
          : `Long-pressed at ${target} for ${args.duration}ms`
      );
    },
  }),
  defineTool({
    name: 'swipe_on_screen',
    description: 'Swipe from one point to another.',
    args: SwipeInputSchema,
    inputSchema: SwipeToolSchema,
    handler: async (args, devices) => {
      const start = { x: args.start_x, y: args.start_y };
      const end = { x: args.end_x, y: args.end_y };
      const { device } = await devices.swipe(args, start, end, args.duration);
      return textResult(
        `Swiped from (${start.x}, ${start.y}) to (${end.x}, ${end.y}) on ${describeDevice(device)}`
      );
    },
  }),
  defineTool({
    name: 'type_keys',
    description: 'Type text into the focused input field.',
    args: TypeKeysInputSchema,
    inputSchema: TypeKeysToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.typeText(args, args.text);
      return textResult(`Typed ${args.text.length} characters on ${describeDevice(device)}`);
    },
  }),
  defineTool({
    name: 'press_button',
    description: 'Press a hardware or navigation button.',
    args: PressButtonInputSchema,
    inputSchema: PressButtonToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.pressButton(args, args.button);
      return textResult(`Pressed ${args.button} on ${describeDevice(device)}`);
    },
  }),
  defineTool({
    name: 'launch_app',
    description: 'Launch an app by package name or bundle identifier.',
    args: AppInputSchema,
    inputSchema: AppToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.launchApp(args, args.app_id);
      return textResult(`Launched ${args.app_id} on ${describeDevice(device)}`);
    },
  }),
  defineTool({
    name: 'terminate_app',
    description: 'Stop a running app.',
    args: AppInputSchema,
    inputSchema: AppToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.terminateApp(args, args.app_id);
      return textResult(`Terminated ${args.app_id} on ${describeDevice(device)}`);
    },
  }),
  defineTool({
    name: 'install_app',
    description: 'Install an app from a local .apk file or .app bundle.',
    args: InstallAppInputSchema,
    inputSchema: InstallAppToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.installApp(args, args.app_path);
      return textResult(`Installed ${args.app_path} on ${describeDevice(device)}`);
    },
  }),
  defineTool({
    name: 'uninstall_app',
    description: 'Uninstall an app by package name or bundle identifier.',
    args: AppInputSchema,
    inputSchema: AppToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.uninstallApp(args, args.app_id);
      return textResult(`Uninstalled ${args.app_id} from ${describeDevice(device)}`);
    },
  }),
  defineTool({
    name: 'open_url',
    description: 'Open a URL or deep link on the device.',
    args: OpenUrlInputSchema,
    inputSchema: OpenUrlToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.openUrl(args, args.url);
      return textResult(`Opened ${args.url} on ${describeDevice(device)}`);
    },
  }),
  defineTool({
    name: 'set_orientation',
    description: 'Rotate the screen to portrait or landscape.',
    args: SetOrientationInputSchema,
    inputSchema: SetOrientationToolSchema,
    handler: async (args, devices) => {
      const { device } = await devices.setOrientation(args, args.orientation);
      return textResult(`Orientation set to ${args.orientation} on ${describeDevice(device)}`);
    },
  }),
];

/**
 * The tool catalog bound to a device manager.
 */
export class ToolRegistry {
  private readonly byName: Map<string, RegisteredTool>;

  constructor(
    private readonly devices: DeviceManager,
    tools: readonly RegisteredTool[] = TOOLS
  ) {
    this.byName = new Map(tools.map(tool => [tool.name, tool]));
  }

  list(): Tool[] {
    return Array.from(this.byName.values(), tool => ({
      name: `${TOOL_PREFIX}${tool.name}`,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  // Accepts the published name and the bare name
  find(name: string): RegisteredTool | undefined {
    const bare = name.startsWith(TOOL_PREFIX) ? name.slice(TOOL_PREFIX.length) : name;
    return this.byName.get(bare);
  }

  async call(name: string, args: unknown): Promise<CallToolResult> {
    const tool = this.find(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool.call(args, this.devices);
  }
}
