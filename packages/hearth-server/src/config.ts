export class ServerMisconfiguredError extends Error {
  code = 'SERVER_MISCONFIGURED' as const;
  constructor(message: string) {
    super(message);
    this.name = 'ServerMisconfiguredError';
  }
}

export interface HearthServerConfig {
  host: string;
  port: number;
  corsOrigin: string;
  logger: boolean;
}

export function loadServerConfigFromEnv(env = process.env): HearthServerConfig {
  const host = (env.HEARTH_API_HOST || '').trim() || '0.0.0.0';
  const portRaw = (env.HEARTH_API_PORT || '').trim() || '5000';
  const port = Number(portRaw);

  if (!/^\d+$/.test(portRaw) || port > 65535) {
    throw new ServerMisconfiguredError(`Invalid HEARTH_API_PORT: ${portRaw} (expected 0-65535).`);
  }

  return {
    host,
    port,
    corsOrigin: (env.HEARTH_CORS_ORIGIN || '').trim() || '*',
    logger: env.HEARTH_API_LOG !== '0'
  };
}
