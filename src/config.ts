import { z } from 'zod';
import { ConnectionConfig, ConnectionType } from './types';
import { ConfigError } from './utils/errors';

const port = z.coerce.number().int().min(1).max(65535);
const host = z.string().trim().min(1);

const serialSchema = z.object({
  type: z.literal(ConnectionType.SERIAL),
  path: z.string().trim().min(1),
  baudRate: z.coerce.number().int().positive().optional()
});

const udpSchema = z.object({
  type: z.literal(ConnectionType.UDP),
  remote: z.object({ host, port }),
  local: z.object({
    ip: host.optional(),
    port: z.coerce.number().int().min(0).max(65535).optional()
  }).optional()
});

export const connectionConfigSchema = z.discriminatedUnion('type', [serialSchema, udpSchema]);

/**
 * Flat connection settings as they come from CLI flags or the environment.
 * A serial path selects a serial connection, otherwise host and port are required.
 */
export type ConnectionSettings = {
  serial?: string;
  baudRate?: string | number;
  host?: string;
  port?: string | number;
  localIp?: string;
  localPort?: string | number;
};

/**
 * Validate an untyped connection description
 * @throws ConfigError listing every problem found
 */
export function parseConnectionConfig(input: unknown): ConnectionConfig {
  const result = connectionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`));
  }
  return result.data;
}

export function connectionConfigFromSettings(settings: ConnectionSettings): ConnectionConfig {
  if (settings.serial) {
    return parseConnectionConfig({
      type: ConnectionType.SERIAL,
      path: settings.serial,
      baudRate: settings.baudRate
    });
  }
  const hasLocal = settings.localIp !== undefined || settings.localPort !== undefined;
  return parseConnectionConfig({
    type: ConnectionType.UDP,
    remote: { host: settings.host, port: settings.port },
    local: hasLocal ? { ip: settings.localIp, port: settings.localPort } : undefined
  });
}

/**
 * FLEX_SERIAL_PORT, FLEX_BAUD_RATE, FLEX_HOST, FLEX_PORT, FLEX_LOCAL_IP, FLEX_LOCAL_PORT
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): ConnectionSettings {
  return {
    serial: env.FLEX_SERIAL_PORT || undefined,
    baudRate: env.FLEX_BAUD_RATE || undefined,
    host: env.FLEX_HOST || undefined,
    port: env.FLEX_PORT || undefined,
    localIp: env.FLEX_LOCAL_IP || undefined,
    localPort: env.FLEX_LOCAL_PORT || undefined
  };
}
