/**
 * TLS material for the listener. Node's default protocol and cipher
 * settings apply; only the certificate chain and key are supplied.
 */

import fs from 'node:fs';
import { ConfigError } from '@raygate/shared';

export interface TlsFiles {
  tlsCertFile: string;
  tlsKeyFile: string;
}

export interface TlsMaterial {
  cert: Buffer;
  key: Buffer;
}

export function loadTlsMaterial(files: TlsFiles): TlsMaterial {
  return {
    cert: readPem(files.tlsCertFile, 'certificate'),
    key: readPem(files.tlsKeyFile, 'private key'),
  };
}

function readPem(file: string, what: string): Buffer {
  let pem: Buffer;
  try {
    pem = fs.readFileSync(file);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read TLS ${what} from ${file}: ${message}`);
  }

  if (!pem.includes('-----BEGIN ')) {
    throw new ConfigError(`TLS ${what} at ${file} is not PEM encoded`);
  }
  return pem;
}
