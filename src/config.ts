/**
 * @fileoverview Client configuration for the container engine.
 * Resolves engine host, registry credentials and build defaults from explicit values,
 * environment variables or a YAML configuration file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as core from '@actions/core';
import * as yaml from 'js-yaml';
import { isPlainObject } from 'lodash';

export const DEFAULT_ENGINE_HOST = 'tcp://127.0.0.1:2376';
export const DEFAULT_API_VERSION = 'v1.24';
export const DEFAULT_DOCKERFILE = 'Dockerfile';

/**
 * Configuration used to create an image client.
 * Every field is optional; missing values fall back to the environment and then to defaults.
 */
export type ClientConfig = {
  readonly host?: string | undefined;
  readonly registry?: string | undefined;
  readonly user?: string | undefined;
  readonly password?: string | undefined;
  readonly apiVersion?: string | undefined;
  readonly certPath?: string | undefined;
  readonly noCache?: boolean | undefined;
  readonly forceRemove?: boolean | undefined;
  readonly pullParent?: boolean | undefined;
};

export type ResolvedClientConfig = {
  readonly host: string;
  readonly registry: string;
  readonly user: string;
  readonly password: string;
  readonly apiVersion: string;
  readonly certPath: string | undefined;
  readonly noCache: boolean;
  readonly forceRemove: boolean;
  readonly pullParent: boolean;
};

/**
 * Connection options understood by dockerode.
 */
export type EngineConnection =
  | { readonly socketPath: string }
  | {
      readonly host: string;
      readonly port: number;
      readonly protocol: 'http' | 'https';
      readonly ca?: Buffer;
      readonly cert?: Buffer;
      readonly key?: Buffer;
    };

/**
 * Credentials sent with push requests and, keyed by registry, with build requests.
 */
export type RegistryAuth = {
  readonly username: string;
  readonly password: string;
  readonly serveraddress: string;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Returns an API version in the `v1.41` form used as the request path prefix.
 */
export function normalizeApiVersion(version: string): string {
  return `v${version.trim().replace(/^v/, '')}`;
}

/**
 * Applies environment fallbacks and defaults to a client configuration.
 *
 * @param config - Explicit configuration values.
 * @param env - Environment to read DOCKER_HOST, DOCKER_CERT_PATH and DOCKER_API_VERSION from.
 */
export function resolveClientConfig(
  config: ClientConfig,
  env: NodeJS.ProcessEnv = process.env
): ResolvedClientConfig {
  return {
    host: config.host || env.DOCKER_HOST || DEFAULT_ENGINE_HOST,
    registry: config.registry ?? '',
    user: config.user ?? '',
    password: config.password ?? '',
    apiVersion: normalizeApiVersion(config.apiVersion || env.DOCKER_API_VERSION || DEFAULT_API_VERSION),
    certPath: config.certPath || env.DOCKER_CERT_PATH || undefined,
    noCache: config.noCache ?? true,
    forceRemove: config.forceRemove ?? true,
    pullParent: config.pullParent ?? true,
  };
}

function readCertificates(certPath: string): { ca: Buffer; cert: Buffer; key: Buffer } {
  return {
    ca: fs.readFileSync(path.join(certPath, 'ca.pem')),
    cert: fs.readFileSync(path.join(certPath, 'cert.pem')),
    key: fs.readFileSync(path.join(certPath, 'key.pem')),
  };
}

/**
 * Translates an engine host string into dockerode connection options.
 * Supports unix://, npipe://, tcp://, http:// and https:// hosts. A certificate
 * directory switches TCP connections to TLS.
 *
 * @param host - Engine host (e.g. "tcp://127.0.0.1:2376" or "unix:///var/run/docker.sock")
 * @param certPath - Optional directory holding ca.pem, cert.pem and key.pem
 */
export function parseEngineHost(host: string, certPath?: string): EngineConnection {
  const schemeEnd = host.indexOf('://');
  if (schemeEnd < 0) {
    throw new ConfigError(`Invalid engine host '${host}': missing scheme`);
  }
  const scheme = host.slice(0, schemeEnd);
  const address = host.slice(schemeEnd + 3);

  if (scheme === 'unix' || scheme === 'npipe') {
    if (!address) {
      throw new ConfigError(`Invalid engine host '${host}': missing socket path`);
    }
    return { socketPath: address };
  }

  if (scheme !== 'tcp' && scheme !== 'http' && scheme !== 'https') {
    throw new ConfigError(`Unsupported engine host scheme '${scheme}' in '${host}'`);
  }

  const authority = address.replace(/\/+$/, '');
  const portSeparator = authority.lastIndexOf(':');
  if (portSeparator <= 0) {
    throw new ConfigError(`Invalid engine host '${host}': missing port`);
  }
  const hostname = authority.slice(0, portSeparator);
  const port = Number(authority.slice(portSeparator + 1));
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`Invalid engine host '${host}': bad port`);
  }

  if (certPath) {
    return { host: hostname, port, protocol: 'https', ...readCertificates(certPath) };
  }
  return { host: hostname, port, protocol: scheme === 'https' ? 'https' : 'http' };
}

export function createRegistryAuth(config: ResolvedClientConfig): RegistryAuth {
  return {
    username: config.user,
    password: config.password,
    serveraddress: config.registry,
  };
}

const STRING_KEYS = ['host', 'registry', 'user', 'password', 'apiVersion', 'certPath'] as const;
const BOOLEAN_KEYS = ['noCache', 'forceRemove', 'pullParent'] as const;

function readStringKey(document: Record<string, unknown>, key: string, filePath: string): string | undefined {
  const value = document[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`Invalid value for '${key}' in ${filePath}: expected a string`);
  }
  return value;
}

function readBooleanKey(document: Record<string, unknown>, key: string, filePath: string): boolean | undefined {
  const value = document[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Invalid value for '${key}' in ${filePath}: expected a boolean`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value);
}

/**
 * Reads a client configuration from a YAML file.
 * Unknown keys are ignored with a debug message; keys of the wrong type are rejected.
 *
 * @param filePath - Path to the YAML configuration file.
 */
export function loadClientConfig(filePath: string): ClientConfig {
  const document: unknown = yaml.load(fs.readFileSync(filePath, 'utf8'));

  if (document === undefined || document === null) {
    core.debug(`Empty configuration file: ${filePath}`);
    return {};
  }
  if (!isRecord(document)) {
    throw new ConfigError(`Invalid configuration file ${filePath}: expected a mapping`);
  }

  const knownKeys: ReadonlyArray<string> = [...STRING_KEYS, ...BOOLEAN_KEYS];
  for (const key of Object.keys(document)) {
    if (!knownKeys.includes(key)) {
      core.debug(`Ignoring unknown configuration key '${key}' in ${filePath}`);
    }
  }

  return {
    host: readStringKey(document, 'host', filePath),
    registry: readStringKey(document, 'registry', filePath),
    user: readStringKey(document, 'user', filePath),
    password: readStringKey(document, 'password', filePath),
    apiVersion: readStringKey(document, 'apiVersion', filePath),
    certPath: readStringKey(document, 'certPath', filePath),
    noCache: readBooleanKey(document, 'noCache', filePath),
    forceRemove: readBooleanKey(document, 'forceRemove', filePath),
    pullParent: readBooleanKey(document, 'pullParent', filePath),
  };
}
