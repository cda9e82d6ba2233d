import { isIP } from 'net';
import axios, { AxiosInstance } from 'axios';
import { TokenCreation, TokenMetadata } from '../types';
import { logger, shortAddress } from './logger';
import { errorMessage } from './errors';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: JsonObject | undefined, key: string): string | undefined {
  const value = source?.[key];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function objectField(source: JsonObject | undefined, key: string): JsonObject | undefined {
  const value = source?.[key];
  return isObject(value) ? value : undefined;
}

function ipv4Octets(host: string): number[] | undefined {
  if (isIP(host) !== 4) return undefined;
  return host.split('.').map(Number);
}

function isPrivateIPv4([a, b]: number[]): boolean {
  return a === 0
    || a === 10
    || a === 127
    || (a === 100 && b >= 64 && b <= 127)
    || (a === 169 && b === 254)
    || (a === 172 && b >= 16 && b <= 31)
    || (a === 192 && b === 168)
    || a >= 224;
}

/**
 * Loopback, link-local, private and unspecified hosts, given as a name
 * or a literal address.
 */
export function isInternalHost(hostname: string): boolean {
  const host = hostname.toLowerCase().replace(/^\[|\]$/g, '');

  if (host === 'localhost' || host.endsWith('.localhost') || host.endsWith('.internal')) return true;

  const octets = ipv4Octets(host);
  if (octets) return isPrivateIPv4(octets);

  if (isIP(host) === 6) {
    if (host === '::' || host === '::1') return true;
    if (/^f[cd]/.test(host) || /^fe[89ab]/.test(host)) return true;
    // IPv4-mapped addresses, dotted or as URL serializes them (::ffff:7f00:1)
    const dotted = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/.exec(host);
    if (dotted) return isPrivateIPv4(dotted[1].split('.').map(Number));
    const hex = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(host);
    if (hex) {
      const high = parseInt(hex[1], 16);
      return isPrivateIPv4([high >> 8, high & 0xff]);
    }
  }

  return false;
}

function parseUrl(value: string): URL | undefined {
  try {
    return new URL(value);
  } catch {
    return undefined;
  }
}

/**
 * Metadata URIs are written by the token creator; only public https
 * hosts are fetched.
 */
export function isFetchableMetadataUri(uri: string): boolean {
  const url = parseUrl(uri);
  return url !== undefined && url.protocol === 'https:' && !isInternalHost(url.hostname);
}

/** Keeps a link only when it is plain http(s). */
export function safeLink(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const url = parseUrl(value);
  return url && (url.protocol === 'http:' || url.protocol === 'https:') ? value : undefined;
}

export interface OffChainMetadata {
  image?: string;
  description?: string;
  twitter?: string;
  telegram?: string;
  website?: string;
}

/**
 * Social links show up at the top level (Pump.fun uploads) or under
 * properties/extensions (Metaplex-style JSON).
 */
export function parseOffChainMetadata(data: unknown): OffChainMetadata {
  if (!isObject(data)) return {};

  const socials = objectField(objectField(data, 'properties'), 'socials')
    ?? objectField(objectField(data, 'extensions'), 'socials');

  return {
    image: safeLink(stringField(data, 'image')),
    description: stringField(data, 'description'),
    twitter: safeLink(stringField(data, 'twitter') ?? stringField(socials, 'twitter')),
    telegram: safeLink(stringField(data, 'telegram') ?? stringField(socials, 'telegram')),
    website: safeLink(stringField(data, 'website') ?? stringField(data, 'external_url') ?? stringField(socials, 'website')),
  };
}

export class TokenMetadataFetcher {
  constructor(private readonly http: AxiosInstance = axios.create({ timeout: 5000 })) {}

  /**
   * On-chain fields come from the creation instruction; the rest is read
   * from the metadata URI. A failed lookup leaves those fields out.
   */
  async fetchTokenMetadata(creation: TokenCreation, signal?: AbortSignal): Promise<TokenMetadata> {
    const metadata: TokenMetadata = {
      name: creation.name,
      symbol: creation.symbol,
      uri: creation.uri,
      isMayhemMode: creation.isMayhemMode,
      creator: creation.creator,
      createdAt: creation.createdAt,
    };

    if (!creation.uri) return metadata;

    if (!isFetchableMetadataUri(creation.uri)) {
      logger.warn(`Skipping metadata URI for ${shortAddress(creation.mint)}: not a public https address`, {
        uri: creation.uri,
      });
      return metadata;
    }

    try {
      // A redirect could point back at an internal host
      const response = await this.http.get<unknown>(creation.uri, { signal, maxRedirects: 0 });
      return { ...metadata, ...parseOffChainMetadata(response.data) };
    } catch (error) {
      if (signal?.aborted) throw error;
      logger.warn(`Could not fetch off-chain metadata for ${shortAddress(creation.mint)}`, {
        uri: creation.uri,
        error: errorMessage(error),
      });
      return metadata;
    }
  }
}
