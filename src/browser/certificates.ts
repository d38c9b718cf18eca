/**
 * Client certificates, keyed by host.
 *
 * A certificate is presented to a host only when both
 * `<dir>/<host>.crt` and `<dir>/<host>.key` exist. The files are made by
 * the user (see certificateInstructions); nothing here creates them.
 */

import { access, readFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { join } from 'node:path';

export interface ClientCertificate {
  certPath: string;
  keyPath: string;
}

export interface CertificateMaterial {
  cert: Buffer;
  key: Buffer;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

export class CertificateRegistry {
  constructor(readonly directory: string) {}

  pathsFor(host: string): ClientCertificate {
    return {
      certPath: join(this.directory, `${host}.crt`),
      keyPath: join(this.directory, `${host}.key`),
    };
  }

  async lookup(host: string): Promise<ClientCertificate | null> {
    const paths = this.pathsFor(host);
    const [hasCert, hasKey] = await Promise.all([exists(paths.certPath), exists(paths.keyPath)]);
    return hasCert && hasKey ? paths : null;
  }

  async load(host: string): Promise<CertificateMaterial | null> {
    const paths = await this.lookup(host);
    if (!paths) return null;

    const [cert, key] = await Promise.all([readFile(paths.certPath), readFile(paths.keyPath)]);
    return { cert, key };
  }
}

/**
 * Shell instructions for creating a self-signed client certificate.
 */
export function certificateInstructions(registry: CertificateRegistry, host: string): string[] {
  const { certPath, keyPath } = registry.pathsFor(host);
  return [
    `${host} asks for a client certificate. To create one, run:`,
    '',
    `  mkdir -p ${registry.directory}`,
    `  openssl req -x509 -newkey rsa:4096 -sha256 -days 3650 -nodes \\`,
    `    -subj "/CN=${host}" -keyout ${keyPath} -out ${certPath}`,
    '',
    'It is presented on every later request to this host.',
  ];
}
