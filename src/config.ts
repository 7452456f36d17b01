import { z } from 'zod';
import { PlatformSelector } from './types';

export type UiDumpPolicy = 'strict' | 'partial';

export interface ServerConfig {
  debug: boolean;
  defaultPlatform: PlatformSelector;
  adbPath: string;
  adbServerHost?: string;
  adbServerPort?: number;
  commandTimeoutMs: number;
  installTimeoutMs: number;
  uiDumpPolicy: UiDumpPolicy;
}

const optionalString = z
  .string()
  .trim()
  .transform(value => (value === '' ? undefined : value))
  .optional();

const EnvSchema = z.object({
  MOBILE_DEVICE_MCP_DEBUG: optionalString,
  MOBILE_PLATFORM: optionalString.pipe(z.enum(['android', 'ios', 'auto']).default('auto')),
  MOBILE_DEVICE_MCP_ADB_PATH: optionalString,
  MOBILE_DEVICE_MCP_ADB_HOST: optionalString,
  MOBILE_DEVICE_MCP_ADB_PORT: optionalString.pipe(
    z.coerce.number().int().min(1).max(65535).optional()
  ),
  MOBILE_DEVICE_MCP_COMMAND_TIMEOUT_MS: optionalString.pipe(
    z.coerce.number().int().positive().default(30000)
  ),
  MOBILE_DEVICE_MCP_INSTALL_TIMEOUT_MS: optionalString.pipe(
    z.coerce.number().int().positive().default(120000)
  ),
  MOBILE_DEVICE_MCP_UI_DUMP: optionalString.pipe(z.enum(['strict', 'partial']).default('strict')),
});

function isEnabled(flag: string | undefined): boolean {
  if (flag === undefined) {
    return false;
  }
  return !['0', 'false', 'no', 'off'].includes(flag.toLowerCase());
}

/**
 * Read server configuration from environment variables.
 *
 * Called once at startup; the result is passed down explicitly.
 *
 * @throws If a variable is set to a value outside its allowed range.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const values = result.data;
  return {
    debug: isEnabled(values.MOBILE_DEVICE_MCP_DEBUG),
    defaultPlatform: values.MOBILE_PLATFORM,
    adbPath: values.MOBILE_DEVICE_MCP_ADB_PATH ?? 'adb',
    adbServerHost: values.MOBILE_DEVICE_MCP_ADB_HOST,
    adbServerPort: values.MOBILE_DEVICE_MCP_ADB_PORT,
    commandTimeoutMs: values.MOBILE_DEVICE_MCP_COMMAND_TIMEOUT_MS,
    installTimeoutMs: values.MOBILE_DEVICE_MCP_INSTALL_TIMEOUT_MS,
    uiDumpPolicy: values.MOBILE_DEVICE_MCP_UI_DUMP,
  };
}
