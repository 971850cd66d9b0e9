import { OutputMode, type ProxmoxConfig, type ProxmoxCredentials } from '@pvelens/shared';
import { logger } from '@pvelens/reports';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ServerConfig {
  proxmox: ProxmoxConfig;
  credentials: ProxmoxCredentials;
  /** Output mode used when a tool call does not choose one */
  output: OutputMode;
}

const Env = z.object({
  PROXMOX_URL: z.string().url(),
  PROXMOX_TOKEN_ID: z.string().min(1),
  PROXMOX_TOKEN_SECRET: z.string().min(1),
  PROXMOX_VERIFY_TLS: z.enum(['true', 'false']).default('true'),
  PVELENS_OUTPUT: OutputMode.default('text'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    const names = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError(`Invalid or missing environment variables: ${names.join(', ')}`);
  }

  const vars = parsed.data;
  const tlsRejectUnauthorized = vars.PROXMOX_VERIFY_TLS === 'true';
  if (!tlsRejectUnauthorized) {
    logger.warn(
      { endpoint: vars.PROXMOX_URL },
      'PROXMOX_VERIFY_TLS=false: accepting self-signed certificates',
    );
  }

  return {
    proxmox: { endpoint: vars.PROXMOX_URL, tlsRejectUnauthorized },
    credentials: { tokenId: vars.PROXMOX_TOKEN_ID, tokenSecret: vars.PROXMOX_TOKEN_SECRET },
    output: vars.PVELENS_OUTPUT,
  };
}
