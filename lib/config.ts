import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const configSchema = z.object({
  HMS_DB_PATH: z.string().trim().min(1).default(path.join(process.cwd(), 'data', 'hms.db')),
  HMS_REMOTE_HOST: optionalString,
  HMS_DEPLOY_USER: optionalString,
  HMS_BACKUP_ROOT: z.string().trim().startsWith('/').default('/var/backups/hms'),
  HMS_SYSTEMD_DIR: z.string().trim().startsWith('/').default('/etc/systemd/system'),
  HMS_NGINX_DIR: z.string().trim().startsWith('/').default('/etc/nginx'),
  HMS_LETSENCRYPT_DIR: z.string().trim().startsWith('/').default('/etc/letsencrypt'),
  HMS_ACME_WEBROOT: z.string().trim().startsWith('/').default('/var/www/certbot'),
  HMS_CERTBOT_EMAIL: optionalString,
  HMS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  HMS_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PORT: z.coerce.number().int().min(1).max(65535).default(5051),
});

export interface HostLayout {
  systemdDir: string;
  nginxDir: string;
  letsencryptDir: string;
  acmeWebroot: string;
  backupRoot: string;
  deployUser?: string;
  certbotEmail?: string;
}

export interface HmsConfig {
  dbPath: string;
  remoteHost?: string;
  layout: HostLayout;
  commandTimeoutMs: number;
  httpTimeoutMs: number;
  serverPort: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HmsConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  return {
    dbPath: values.HMS_DB_PATH,
    remoteHost: values.HMS_REMOTE_HOST,
    layout: {
      systemdDir: values.HMS_SYSTEMD_DIR,
      nginxDir: values.HMS_NGINX_DIR,
      letsencryptDir: values.HMS_LETSENCRYPT_DIR,
      acmeWebroot: values.HMS_ACME_WEBROOT,
      backupRoot: values.HMS_BACKUP_ROOT,
      deployUser: values.HMS_DEPLOY_USER,
      certbotEmail: values.HMS_CERTBOT_EMAIL,
    },
    commandTimeoutMs: values.HMS_COMMAND_TIMEOUT_MS,
    httpTimeoutMs: values.HMS_HTTP_TIMEOUT_MS,
    serverPort: values.PORT,
  };
}
