import path from 'path';
import { InvalidInputError, UnitFileFormatError } from './errors';
import type { ApplicationRecord } from './models';
import { serviceName } from './models';
import { shellQuote } from './shell';

export type UnitTemplate = 'rails' | 'hms';

export const MANAGED_BEGIN = '# BEGIN HMS MANAGED ENVIRONMENT';
export const MANAGED_END = '# END HMS MANAGED ENVIRONMENT';

export function unitPath(systemdDir: string, app: Pick<ApplicationRecord, 'appKey'>): string {
  return path.join(systemdDir, serviceName(app));
}

// systemd unquotes "..." and expands % specifiers inside Environment= values.
export function escapeEnvironmentValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/%/g, '%%');
}

/**
 * `Environment=` lines for the managed section, one per variable, sorted by
 * name so the same secrets always render the same bytes.
 */
export function renderEnvironmentLines(env: Record<string, string>): string[] {
  return Object.keys(env)
    .sort()
    .map((name) => {
      if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
        throw new InvalidInputError(`Invalid environment variable name: ${name}`);
      }
      const value = env[name];
      if (/[\r\n]/.test(value)) {
        throw new InvalidInputError(`Value of ${name} contains a line break`);
      }
      return `Environment="${name}=${escapeEnvironmentValue(value)}"`;
    });
}

export function renderManagedSection(env: Record<string, string>): string[] {
  return [MANAGED_BEGIN, ...renderEnvironmentLines(env), MANAGED_END];
}

/**
 * Swap the managed section of an existing unit for `section`, leaving every
 * other line as it was. A unit without markers gets the section right after
 * its [Service] header.
 */
export function replaceManagedSection(unitFile: string, filePath: string, section: string[]): string {
  const lines = unitFile.split('\n');
  const begin = lines.indexOf(MANAGED_BEGIN);
  const end = lines.indexOf(MANAGED_END);

  if (begin === -1 && end === -1) {
    const service = lines.findIndex((line) => line.trim() === '[Service]');
    if (service === -1) {
      throw new UnitFileFormatError(filePath, 'no [Service] section to hold the managed environment');
    }
    return [...lines.slice(0, service + 1), ...section, ...lines.slice(service + 1)].join('\n');
  }

  if (begin === -1 || end === -1 || end < begin) {
    throw new UnitFileFormatError(filePath, 'managed environment markers are unbalanced');
  }
  if (lines.indexOf(MANAGED_BEGIN, begin + 1) !== -1 || lines.indexOf(MANAGED_END, end + 1) !== -1) {
    throw new UnitFileFormatError(filePath, 'managed environment markers appear more than once');
  }

  return [...lines.slice(0, begin), ...section, ...lines.slice(end + 1)].join('\n');
}

export interface UnitOptions {
  template: UnitTemplate;
  user?: string;
}

// Create a systemd unit for an application, managed section included
export function renderUnit(app: ApplicationRecord, env: Record<string, string>, options: UnitOptions): string {
  const user = options.user ?? 'root';
  const managed = renderManagedSection(env).join('\n');

  if (options.template === 'hms') {
    return `[Unit]
Description=Hosting Management System (${app.appKey})
After=network.target postgresql.service
Wants=network.target

[Service]
Type=simple
User=${user}
Group=${user}
WorkingDirectory=${app.deployPath}
Environment="PYTHONUNBUFFERED=1"
Environment="PORT=${app.port}"
${managed}
ExecStart=${app.deployPath}/.venv/bin/uvicorn app_fastapi:app --host 127.0.0.1 --port ${app.port}
Restart=always
RestartSec=5
StandardOutput=journal
StandardError=journal
SyslogIdentifier=${app.appKey}

[Install]
WantedBy=multi-user.target
`;
  }

  return `[Unit]
Description=${app.appKey} (Rails)
After=network.target postgresql.service
Wants=network.target

[Service]
Type=simple
User=${user}
Group=${user}
WorkingDirectory=${app.deployPath}
Environment="RAILS_ENV=production"
Environment="RAILS_LOG_TO_STDOUT=1"
Environment="RAILS_SERVE_STATIC_FILES=1"
Environment="PORT=${app.port}"
${managed}
ExecStart=/usr/bin/env bundle exec puma -b tcp://127.0.0.1:${app.port} -e production
Restart=always
RestartSec=5
StandardOutput=journal
StandardError=journal
SyslogIdentifier=${app.appKey}

[Install]
WantedBy=multi-user.target
`;
}

export const systemctl = {
  daemonReload: () => 'systemctl daemon-reload',
  isActive: (unit: string) => `systemctl is-active ${shellQuote(unit)}`,
  start: (unit: string) => `systemctl start ${shellQuote(unit)}`,
  restart: (unit: string) => `systemctl restart ${shellQuote(unit)}`,
  enable: (unit: string) => `systemctl enable ${shellQuote(unit)}`,
  // Both tolerate a unit that was never installed.
  stop: (unit: string) => `systemctl stop ${shellQuote(unit)} 2>/dev/null || true`,
  disable: (unit: string) => `systemctl disable ${shellQuote(unit)} 2>/dev/null || true`,
  reload: (unit: string) => `systemctl reload ${shellQuote(unit)}`,
};
