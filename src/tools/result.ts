import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { Device, ElementListing, InstalledApp, ScreenElement, ScreenSize } from '../types';
import type { Discovery } from '../devices/manager';
import { binaryToBase64 } from '../utils/screenshot';

export const NO_DEVICES_TEXT = 'No devices found';

export function textResult(...lines: string[]): CallToolResult {
  return { content: [{ type: 'text', text: lines.join('\n') }] };
}

export function imageResult(png: Buffer): CallToolResult {
  return { content: [{ type: 'image', data: binaryToBase64(png), mimeType: 'image/png' }] };
}

export function describeDevice(device: Device): string {
  return `${device.display_name} (${device.id})`;
}

export function formatDevice(device: Device): string {
  return `- ${describeDevice(device)} - ${device.platform} ${device.kind} [${device.state}]`;
}

// Failures of one platform are a second block so the device list itself stays unchanged
export function devicesResult({ devices, failures }: Discovery): CallToolResult {
  const listing =
    devices.length === 0 ? NO_DEVICES_TEXT : ['Available devices:', ...devices.map(formatDevice)].join('\n');
  const result: CallToolResult = { content: [{ type: 'text', text: listing }] };

  if (failures.length > 0) {
    result.content.push({
      type: 'text',
      text: failures.map(failure => `Warning: ${failure.platform} discovery failed: ${failure.message}`).join('\n'),
    });
  }
  return result;
}

export function screenSizeResult(size: ScreenSize): CallToolResult {
  const line = `Screen size: ${size.width}x${size.height} pixels`;
  if (!size.estimated) {
    return textResult(line);
  }

  const { points, scale, model } = size.estimated;
  const source = model === 'default' ? 'default size for unknown models' : `model table entry "${model}"`;
  return textResult(`${line} (${points.width}x${points.height} points @${scale}x, estimated from ${source})`);
}

export function elementLabel(element: ScreenElement): string {
  return element.text || element.content_desc || element.resource_id || element.class_name || '(unnamed)';
}

export function formatElement(element: ScreenElement): string {
  const { x, y, width, height } = element.bounds;
  const centerX = Math.round(x + width / 2);
  const centerY = Math.round(y + height / 2);

  let line = `- ${JSON.stringify(elementLabel(element))} at (${centerX}, ${centerY}) bounds [${x},${y}][${x + width},${y + height}]`;
  if (element.class_name) line += ` [type: ${element.class_name}]`;
  if (element.resource_id) line += ` [id: ${element.resource_id}]`;
  if (element.clickable) line += ' [clickable]';
  if (element.focused) line += ' [focused]';
  return line;
}

export function elementsResult({ elements, partial }: ElementListing): CallToolResult {
  const header = partial
    ? 'Screen elements (partial: the UI dump was malformed, only complete nodes are listed):'
    : 'Screen elements:';
  if (elements.length === 0) {
    return textResult(partial ? `${header}\nNo elements found` : 'No elements found');
  }
  return textResult(header, ...elements.map(formatElement));
}

export function appsResult(apps: InstalledApp[]): CallToolResult {
  if (apps.length === 0) {
    return textResult('No apps found');
  }
  return textResult(
    'Installed apps:',
    ...apps.map(app => (app.name === app.id ? `- ${app.id}` : `- ${app.name} (${app.id})`))
  );
}
