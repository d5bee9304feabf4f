import { X509Certificate, createPrivateKey } from "node:crypto";
import { existsSync, readFileSync, statSync } from "node:fs";
import { join } from "node:path";
import type { CleanupStack } from "./cleanup.js";
import type { SslOptions } from "./config.js";
import { formatError } from "./errors.js";
import type { Logger } from "./log.js";

const CA_FILE = "ca.pem";

export interface ClientIdentity {
  cert: Buffer;
  key: Buffer;
  subject: string;
}

/** Directory of PEM files: `ca.pem` (optional) and `<name>.cert.pem` / `<name>.key.pem` pairs. */
export class CertificateStore {
  private caCerts: Buffer | undefined;
  private open = true;

  private constructor(readonly dir: string, ca: Buffer | undefined) {
    this.caCerts = ca;
  }

  static open(dir: string): CertificateStore {
    let isDir = false;
    try {
      isDir = statSync(dir).isDirectory();
    } catch (err) {
      throw new Error(`certificate store ${dir}: ${formatError(err)}`, { cause: err });
    }
    if (!isDir) {
      throw new Error(`certificate store ${dir}: not a directory`);
    }
    const caPath = join(dir, CA_FILE);
    return new CertificateStore(dir, existsSync(caPath) ? readFileSync(caPath) : undefined);
  }

  get ca(): Buffer | undefined {
    return this.caCerts;
  }

  loadIdentity(name: string): ClientIdentity {
    if (!this.open) {
      throw new Error(`certificate store ${this.dir} is closed`);
    }
    const certPath = join(this.dir, `${name}.cert.pem`);
    const keyPath = join(this.dir, `${name}.key.pem`);
    let cert: Buffer;
    let key: Buffer;
    try {
      cert = readFileSync(certPath);
      key = readFileSync(keyPath);
    } catch (err) {
      throw new Error(`Cannot open certificate and key "${name}": ${formatError(err)}`, { cause: err });
    }

    const x509 = new X509Certificate(cert);
    if (!x509.checkPrivateKey(createPrivateKey(key))) {
      key.fill(0);
      throw new Error(`Certificate "${name}" does not match its private key`);
    }
    return { cert, key, subject: x509.subject };
  }

  close(): void {
    this.caCerts = undefined;
    this.open = false;
  }
}

/** Last TLS session per server name, for resumption on the next handshake. */
export class TlsSessionCache {
  private sessions = new Map<string, Buffer>();

  get(serverName: string): Buffer | undefined {
    return this.sessions.get(serverName);
  }

  set(serverName: string, session: Buffer): void {
    this.sessions.set(serverName, session);
  }

  get size(): number {
    return this.sessions.size;
  }

  clear(): void {
    this.sessions.clear();
  }
}

export interface SecurityContext {
  store: CertificateStore;
  sessions: TlsSessionCache;
  identity: ClientIdentity;
}

/**
 * Load everything a TLS connection needs, registering each release on
 * `resources` as soon as the piece is acquired. If a later step throws, the
 * earlier pieces stay on the stack for the caller to unwind.
 */
export function acquireSecurity(ssl: SslOptions, resources: CleanupStack, log: Logger): SecurityContext {
  const store = resources.acquire(
    "certificate store",
    () => CertificateStore.open(ssl.nssdb),
    (s) => s.close()
  );
  const sessions = resources.acquire(
    "session cache",
    () => new TlsSessionCache(),
    (cache) => cache.clear()
  );
  const identity = resources.acquire(
    "client certificate and key",
    () => store.loadIdentity(ssl.clientCertName),
    (id) => id.key.fill(0)
  );
  log.info(`using client certificate ${identity.subject}`);
  return { store, sessions, identity };
}
