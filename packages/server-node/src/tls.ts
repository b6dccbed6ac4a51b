import { readFileSync } from 'node:fs';
import { createSecureContext, type TlsOptions as NodeTlsOptions } from 'node:tls';
import { Type, type Static } from '@sinclair/typebox';
import { ConfigError } from '@sluice/server';

/**
 * Certificate or key material: raw bytes, an explicit `{ path }` or
 * `{ data }`, or a string read according to the `storage` setting.
 */
export const TlsMaterial = Type.Union([
  Type.String({ minLength: 1 }),
  Type.Uint8Array(),
  Type.Object({ path: Type.String({ minLength: 1 }) }, { additionalProperties: false }),
  Type.Object(
    { data: Type.Union([Type.String(), Type.Uint8Array()]) },
    { additionalProperties: false }
  ),
]);

export type TlsMaterial = Static<typeof TlsMaterial>;

export const TlsOptions = Type.Object(
  {
    cert: Type.Union([TlsMaterial, Type.Array(TlsMaterial, { minItems: 1 })]),
    key: TlsMaterial,
    ca: Type.Optional(Type.Union([TlsMaterial, Type.Array(TlsMaterial, { minItems: 1 })])),
    passphrase: Type.Optional(Type.String()),
    /** Client certificate policy. */
    authMode: Type.Optional(
      Type.Union([Type.Literal('none'), Type.Literal('optional'), Type.Literal('require')])
    ),
    ciphers: Type.Optional(Type.String({ minLength: 1 })),
    /** Seconds a TLS session stays resumable. */
    sessionTimeout: Type.Optional(Type.Integer({ minimum: 1 })),
    /**
     * How strings are read: `guess` treats strings under 256 characters as
     * file paths and longer ones as inline data; `file` and `data` force one.
     */
    storage: Type.Optional(
      Type.Union([Type.Literal('guess'), Type.Literal('file'), Type.Literal('data')])
    ),
  },
  { additionalProperties: false }
);

export type TlsOptions = Static<typeof TlsOptions>;

export type TlsStorage = NonNullable<TlsOptions['storage']>;
export type ClientAuthMode = NonNullable<TlsOptions['authMode']>;

// common PATH_MAX
const PATH_GUESS_LIMIT = 256;

export function readMaterial(material: TlsMaterial, storage: TlsStorage = 'guess'): Buffer {
  if (material instanceof Uint8Array) return Buffer.from(material);
  if (typeof material === 'string') {
    const isPath =
      storage === 'file' || (storage === 'guess' && material.length < PATH_GUESS_LIMIT);
    return isPath ? readPath(material) : Buffer.from(material);
  }
  if ('path' in material) return readPath(material.path);
  return typeof material.data === 'string' ? Buffer.from(material.data) : Buffer.from(material.data);
}

function readPath(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw new ConfigError(`Cannot read TLS material from ${path}`, [], { cause: error });
  }
}

function toList(material: TlsMaterial | TlsMaterial[]): TlsMaterial[] {
  return Array.isArray(material) ? material : [material];
}

export function clientAuth(mode: ClientAuthMode): {
  requestCert: boolean;
  rejectUnauthorized: boolean;
} {
  switch (mode) {
    case 'none':
      return { requestCert: false, rejectUnauthorized: false };
    case 'optional':
      return { requestCert: true, rejectUnauthorized: false };
    case 'require':
      return { requestCert: true, rejectUnauthorized: true };
    default:
      throw new ConfigError(`Invalid client auth mode: ${String(mode satisfies never)}`);
  }
}

/**
 * Turns validated TLS options into Node server options, building a secure
 * context once so that bad material fails here rather than per connection.
 */
export function secureServerOptions(options: TlsOptions): NodeTlsOptions {
  const storage = options.storage ?? 'guess';
  const settings: NodeTlsOptions = {
    cert: toList(options.cert).map((material) => readMaterial(material, storage)),
    key: readMaterial(options.key, storage),
    ca: options.ca && toList(options.ca).map((material) => readMaterial(material, storage)),
    passphrase: options.passphrase,
    ciphers: options.ciphers,
    sessionTimeout: options.sessionTimeout,
    ...clientAuth(options.authMode ?? 'none'),
  };
  try {
    createSecureContext(settings);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError('Invalid TLS material', [reason], { cause: error });
  }
  return settings;
}
