import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { UiDumpPolicy } from '../config';
import {
  Bounds,
  Device,
  ElementListing,
  InstalledApp,
  Orientation,
  OutputParseError,
  ScreenElement,
  ScreenSize,
} from '../types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function splitLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

// adb devices -l
export function parseAdbDeviceList(output: string): Device[] {
  const devices: Device[] = [];

  for (const line of splitLines(output)) {
    if (line.startsWith('List of devices') || line.startsWith('*')) {
      continue;
    }

    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;

    const [id, state] = parts;
    let model: string | undefined;
    for (const part of parts.slice(2)) {
      if (part.startsWith('model:')) {
        model = part.substring(6).replace(/_/g, ' ');
      }
    }

    devices.push({
      id,
      display_name: model ?? id,
      platform: 'android',
      kind: /^emulator-\d+$/.test(id) ? 'emulator' : 'physical',
      state,
      model,
    });
  }

  return devices;
}

// wm size: "Physical size: 1080x2400", optionally followed by "Override size: ..."; bare "1080x2400" is accepted
export function parseWindowSize(output: string): ScreenSize {
  let physical: ScreenSize | undefined;
  let override: ScreenSize | undefined;

  for (const line of splitLines(output)) {
    const match = line.match(/^(?:(physical|override) size:\s*)?(\d+)\s*x\s*(\d+)$/i);
    if (!match) continue;

    const size = { width: parseInt(match[2], 10), height: parseInt(match[3], 10) };
    if (match[1]?.toLowerCase() === 'override') {
      override = size;
    } else {
      physical ??= size;
    }
  }

  const size = override ?? physical;
  if (!size || size.width === 0 || size.height === 0) {
    throw new OutputParseError('screen size', output);
  }
  return size;
}

// settings get system user_rotation: 0..3 quarter turns, or "null" while the
// setting has never been written, in which case the system default of 0 applies
export function parseRotation(output: string): Orientation {
  const value = output.trim();
  if (value === 'null' || value === '') {
    return 'portrait';
  }
  if (!/^[0-3]$/.test(value)) {
    throw new OutputParseError('rotation', output);
  }
  return Number(value) % 2 === 0 ? 'portrait' : 'landscape';
}

// dumpsys SurfaceFlinger --display-id: one "Display <id> ..." line per physical display
export function countDisplays(output: string): number {
  return output.split(/\r?\n/).filter(line => line.startsWith('Display ')).length;
}

function stripLocalPrefix(uniqueId: string): string {
  return uniqueId.startsWith('local:') ? uniqueId.slice('local:'.length) : uniqueId;
}

// cmd display get-displays (Android 11+): the first display in state ON
export function parseActiveDisplayId(output: string): string | undefined {
  for (const line of output.split(/\r?\n/)) {
    if (!line.startsWith('Display id ') || !line.includes(', state ON,')) continue;
    const match = line.match(/uniqueId "([^"]*)"/);
    if (match) {
      return stripLocalPrefix(match[1]);
    }
  }
  return undefined;
}

// dumpsys display: the active internal viewport, for releases without get-displays.
// Several viewports can share one line, so each DisplayViewport{...} is read on its own.
export function parseViewportDisplayId(output: string): string | undefined {
  for (const [, viewport] of output.matchAll(/DisplayViewport\{([^}]*)\}/g)) {
    if (!viewport.startsWith('type=INTERNAL') || !viewport.includes('isActive=true')) continue;
    const match = viewport.match(/uniqueId='([^']*)'/);
    if (match) {
      return stripLocalPrefix(match[1]);
    }
  }
  return undefined;
}

// cmd package query-activities: one "packageName=..." line per launcher activity
export function parseLauncherPackages(output: string): string[] {
  const packages = new Set<string>();
  for (const line of splitLines(output)) {
    const match = line.match(/^packageName=(\S+)$/);
    if (match) {
      packages.add(match[1]);
    }
  }
  return Array.from(packages).sort();
}

// cmd package resolve-activity --brief: last line is "<package>/<activity>"
export function parseResolvedActivity(output: string, packageName: string): string | undefined {
  const component = splitLines(output)
    .reverse()
    .find(line => line.startsWith(`${packageName}/`));
  if (!component) {
    return undefined;
  }
  return component.split(/\s+/)[0];
}

export function parseBounds(value: string): Bounds | undefined {
  const match = value.match(/^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/);
  if (!match) {
    return undefined;
  }
  const [x1, y1, x2, y2] = match.slice(1, 5).map(part => parseInt(part, 10));
  return { x: x1, y: y1, width: x2 - x1, height: y2 - y1 };
}

const ATTRIBUTE_PREFIX = '@_';

function createXmlParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseAttributeValue: false,
    isArray: name => name === 'node',
  });
}

function readAttribute(node: Record<string, unknown>, name: string): string {
  const value = node[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === 'string' ? value : '';
}

// undefined for nodes that occupy no screen area
function toScreenElement(node: Record<string, unknown>, strict: boolean): ScreenElement | undefined {
  const rawBounds = readAttribute(node, 'bounds');
  const bounds = parseBounds(rawBounds);
  if (!bounds) {
    if (strict) {
      throw new OutputParseError('UI hierarchy bounds', rawBounds);
    }
    return undefined;
  }
  if (bounds.width <= 0 || bounds.height <= 0) {
    return undefined;
  }

  return {
    class_name: readAttribute(node, 'class'),
    text: readAttribute(node, 'text'),
    resource_id: readAttribute(node, 'resource-id'),
    content_desc: readAttribute(node, 'content-desc'),
    bounds,
    clickable: readAttribute(node, 'clickable') === 'true',
    focused: readAttribute(node, 'focused') === 'true',
  };
}

function collectNodes(value: unknown, strict: boolean, into: ScreenElement[]): void {
  if (Array.isArray(value)) {
    for (const item of value) {
      collectNodes(item, strict, into);
    }
    return;
  }
  if (!isRecord(value)) {
    return;
  }

  const children = value.node;
  if (Array.isArray(children)) {
    for (const child of children) {
      if (!isRecord(child)) continue;
      const element = toScreenElement(child, strict);
      if (element) {
        into.push(element);
      }
      collectNodes(child, strict, into);
    }
  }
}

function salvageNodes(xml: string): ScreenElement[] {
  const parser = createXmlParser();
  const elements: ScreenElement[] = [];
  const nodeRegex = /<node\b[^<>]*>/g;
  let match: RegExpExecArray | null;

  while ((match = nodeRegex.exec(xml))) {
    const tag = match[0].replace(/\s*\/?>$/, ' />');
    if (XMLValidator.validate(tag) !== true) continue;

    const parsed: unknown = parser.parse(tag);
    if (!isRecord(parsed) || !Array.isArray(parsed.node)) continue;
    const [node] = parsed.node;
    if (!isRecord(node)) continue;

    const element = toScreenElement(node, false);
    if (element) {
      elements.push(element);
    }
  }

  return elements;
}

/**
 * Parse a uiautomator dump into the on-screen elements, in document order.
 *
 * Under the `partial` policy a dump that is not well-formed XML is salvaged
 * node by node and the listing is flagged as partial; under `strict` it is an error.
 */
export function parseUiHierarchy(xml: string, policy: UiDumpPolicy): ElementListing {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    if (policy === 'partial') {
      return { elements: salvageNodes(xml), partial: true };
    }
    const { msg, line } = validation.err;
    throw new OutputParseError('UI hierarchy', `malformed XML at line ${line}: ${msg}`);
  }

  const parsed: unknown = createXmlParser().parse(xml);
  if (!isRecord(parsed) || !isRecord(parsed.hierarchy)) {
    throw new OutputParseError('UI hierarchy', xml);
  }

  const elements: ScreenElement[] = [];
  collectNodes(parsed.hierarchy, policy === 'strict', elements);
  return { elements, partial: false };
}

// Case-insensitive substring match on text, resource id or class
export function filterElements(elements: ScreenElement[], filter?: string): ScreenElement[] {
  const needle = filter?.trim().toLowerCase();
  if (!needle) {
    return elements;
  }
  return elements.filter(element =>
    [element.text, element.resource_id, element.class_name].some(field =>
      field.toLowerCase().includes(needle)
    )
  );
}

const SimctlDeviceListSchema = z.object({
  devices: z.record(
    z.array(
      z.object({
        udid: z.string(),
        name: z.string(),
        state: z.string(),
        isAvailable: z.boolean().optional(),
      })
    )
  ),
});

// com.apple.CoreSimulator.SimRuntime.iOS-17-2 -> iOS 17.2
export function formatRuntimeName(runtime: string): string {
  const identifier = runtime.split('.').pop() ?? runtime;
  const [os, ...version] = identifier.split('-');
  return version.length > 0 ? `${os} ${version.join('.')}` : os;
}

function parseJson(what: string, output: string): unknown {
  try {
    return JSON.parse(output);
  } catch {
    throw new OutputParseError(what, output);
  }
}

// xcrun simctl list devices available --json
export function parseSimctlDevices(output: string): Device[] {
  const result = SimctlDeviceListSchema.safeParse(parseJson('simctl device list', output));
  if (!result.success) {
    throw new OutputParseError('simctl device list', output);
  }

  const devices: Device[] = [];
  for (const [runtime, entries] of Object.entries(result.data.devices)) {
    for (const entry of entries) {
      if (entry.isAvailable === false) continue;
      devices.push({
        id: entry.udid,
        display_name: `${entry.name} (${formatRuntimeName(runtime)})`,
        platform: 'ios',
        kind: 'simulator',
        state: entry.state.toLowerCase(),
        model: entry.name,
      });
    }
  }
  return devices;
}

// idevice_id -l: one UDID per line
export function parseIdeviceIds(output: string): Device[] {
  return splitLines(output)
    .filter(line => /^[0-9A-Fa-f-]{24,40}$/.test(line))
    .map(udid => ({
      id: udid,
      display_name: `iOS device (${udid.slice(0, 8)})`,
      platform: 'ios' as const,
      kind: 'physical' as const,
      state: 'connected',
    }));
}

const SimctlAppsSchema = z.record(
  z
    .object({
      CFBundleDisplayName: z.string().optional(),
      CFBundleName: z.string().optional(),
    })
    .passthrough()
);

// simctl listapps converted to JSON by plutil
export function parseSimctlApps(output: string): InstalledApp[] {
  const result = SimctlAppsSchema.safeParse(parseJson('simctl app list', output));
  if (!result.success) {
    throw new OutputParseError('simctl app list', output);
  }

  return Object.entries(result.data)
    .map(([id, info]) => ({ id, name: info.CFBundleDisplayName ?? info.CFBundleName ?? id }))
    .sort((a, b) => a.id.localeCompare(b.id));
}
