import path from 'path';
import type { HostLayout } from './config';
import type { ApplicationRecord } from './models';
import { fqdn } from './models';
import { shellQuote } from './shell';

export interface ProxySiteOptions {
  tls: boolean;
  layout: Pick<HostLayout, 'letsencryptDir' | 'acmeWebroot'>;
}

export function siteName(app: Pick<ApplicationRecord, 'appKey'>): string {
  return `hms-${app.appKey}`;
}

export function sitePaths(nginxDir: string, app: Pick<ApplicationRecord, 'appKey'>) {
  const name = siteName(app);
  return {
    available: path.join(nginxDir, 'sites-available', name),
    enabled: path.join(nginxDir, 'sites-enabled', name),
  };
}

export function certificateDir(letsencryptDir: string, app: Pick<ApplicationRecord, 'domain' | 'subdomain'>): string {
  return path.join(letsencryptDir, 'live', fqdn(app));
}

function proxyLocation(port: number): string {
  return `	location / {
		proxy_pass http://127.0.0.1:${port};
		proxy_http_version 1.1;
		proxy_set_header Host $host;
		proxy_set_header X-Real-IP $remote_addr;
		proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
		proxy_set_header X-Forwarded-Proto $scheme;
		proxy_set_header Upgrade $http_upgrade;
		proxy_set_header Connection "upgrade";
	}`;
}

// Server blocks for one application. Same input, same bytes.
export function renderSiteConfig(app: ApplicationRecord, options: ProxySiteOptions): string {
  const host = fqdn(app);
  const acme = `	location /.well-known/acme-challenge/ {
		root ${options.layout.acmeWebroot};
	}`;

  let config = `# Managed by hms for ${app.appKey} (port ${app.port}); rewritten on every deploy
`;

  if (!options.tls) {
    config += `server {
	listen 80;
	listen [::]:80;
	server_name ${host};

${acme}

${proxyLocation(app.port)}
}
`;
    return config;
  }

  const certDir = certificateDir(options.layout.letsencryptDir, app);
  config += `server {
	listen 80;
	listen [::]:80;
	server_name ${host};

${acme}

	location / {
		return 301 https://$host$request_uri;
	}
}

server {
	listen 443 ssl http2;
	listen [::]:443 ssl http2;
	server_name ${host};

	ssl_certificate ${certDir}/fullchain.pem;
	ssl_certificate_key ${certDir}/privkey.pem;

	# Security headers
	add_header Strict-Transport-Security "max-age=31536000; includeSubDomains" always;
	add_header X-Content-Type-Options "nosniff" always;
	add_header X-Frame-Options "DENY" always;
	add_header Referrer-Policy "strict-origin-when-cross-origin" always;

	client_max_body_size 25m;
	gzip on;

${proxyLocation(app.port)}
}
`;
  return config;
}

export const nginx = {
  enableSite: (available: string, enabled: string) => `ln -sfn ${shellQuote(available)} ${shellQuote(enabled)}`,
  test: () => 'nginx -t',
  reload: () => 'nginx -t && systemctl reload nginx',
  removeSite: (available: string, enabled: string) => `rm -f ${shellQuote(enabled)} ${shellQuote(available)}`,
};
