import path from 'path';
import { shellQuote } from './shell';

export interface CertbotOptions {
  webroot: string;
  email?: string;
}

export const certbot = {
  exists: (certDir: string) => `test -f ${shellQuote(path.join(certDir, 'fullchain.pem'))}`,

  issue: (host: string, options: CertbotOptions) =>
    [
      'certbot certonly --webroot',
      `-w ${shellQuote(options.webroot)}`,
      `-d ${shellQuote(host)}`,
      '--non-interactive --agree-tos --keep-until-expiring',
      options.email ? `-m ${shellQuote(options.email)}` : '--register-unsafely-without-email',
    ].join(' '),

  remove: (host: string) => `certbot delete --cert-name ${shellQuote(host)} --non-interactive`,
};
