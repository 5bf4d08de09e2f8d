import * as crypto from 'node:crypto';
import { UnsupportedAlgorithmError } from '../errors.js';
import type { DigestFactory, HashAlgorithmName, StreamingDigest } from './types.js';

function nodeDigest(algorithm: string, outputLength?: number): DigestFactory {
  return (): StreamingDigest => {
    const hash =
      outputLength === undefined ? crypto.createHash(algorithm) : crypto.createHash(algorithm, { outputLength });
    return {
      update: (chunk) => {
        hash.update(chunk);
      },
      digest: () => hash.digest('hex'),
    };
  };
}

function aliasKey(name: string): string {
  return name.trim().toLowerCase().replace(/[_\s]/g, '-');
}

/**
 * Maps algorithm names and aliases to digest factories.
 *
 * Lookups are case-insensitive and treat `_` and `-` alike, so `SHA3_256`,
 * `sha3-256` and `sha3_256` all resolve to the same entry.
 */
export class HashAlgorithmRegistry {
  private readonly factories = new Map<HashAlgorithmName, DigestFactory>();
  private readonly aliases = new Map<string, HashAlgorithmName>();

  register(name: HashAlgorithmName, factory: DigestFactory, aliases: readonly string[] = []): this {
    const canonical = name.toLowerCase();
    this.factories.set(canonical, factory);
    this.aliases.set(aliasKey(canonical), canonical);
    for (const alias of aliases) {
      this.aliases.set(aliasKey(alias), canonical);
    }
    return this;
  }

  has(name: string): boolean {
    return this.aliases.has(aliasKey(name));
  }

  /**
   * Resolve a user-supplied name to its canonical form.
   *
   * @throws UnsupportedAlgorithmError for unknown names
   */
  resolve(name: string): HashAlgorithmName {
    const canonical = this.aliases.get(aliasKey(name));
    if (canonical === undefined) {
      throw new UnsupportedAlgorithmError(name, this.names());
    }
    return canonical;
  }

  create(name: string): StreamingDigest {
    const factory = this.factories.get(this.resolve(name));
    if (factory === undefined) {
      throw new UnsupportedAlgorithmError(name, this.names());
    }
    return factory();
  }

  /** Canonical names, sorted. */
  names(): HashAlgorithmName[] {
    return [...this.factories.keys()].sort();
  }
}

/** Registry preloaded with every algorithm the manifest format supports. */
export function createDefaultHashRegistry(): HashAlgorithmRegistry {
  return new HashAlgorithmRegistry()
    .register('md5', nodeDigest('md5'))
    .register('sha1', nodeDigest('sha1'), ['sha-1'])
    .register('sha224', nodeDigest('sha224'), ['sha-224'])
    .register('sha256', nodeDigest('sha256'), ['sha-256'])
    .register('sha384', nodeDigest('sha384'), ['sha-384'])
    .register('sha512', nodeDigest('sha512'), ['sha-512'])
    .register('sha3-224', nodeDigest('sha3-224'))
    .register('sha3-256', nodeDigest('sha3-256'))
    .register('sha3-384', nodeDigest('sha3-384'))
    .register('sha3-512', nodeDigest('sha3-512'))
    // SHAKE output lengths in bytes: 256 and 512 bits respectively.
    .register('shake128', nodeDigest('shake128', 32), ['shake-128'])
    .register('shake256', nodeDigest('shake256', 64), ['shake-256'])
    .register('blake2b', nodeDigest('blake2b512'), ['blake2b512', 'blake2b-512'])
    .register('blake2s', nodeDigest('blake2s256'), ['blake2s256', 'blake2s-256']);
}

export const defaultHashRegistry: HashAlgorithmRegistry = createDefaultHashRegistry();
