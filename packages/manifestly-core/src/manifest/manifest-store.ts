/**
 * Loads and saves manifests through the storage backends.
 *
 * A location may name the manifest file itself or a directory, in which
 * case the configured manifest file name inside it is used.
 */

import type { Logger } from 'pino';
import { InvalidPathError, ManifestNotFoundError } from '../errors.js';
import { defaultHashRegistry } from '../hash/registry.js';
import { formatLocation } from '../storage/resolver.js';
import { jsonManifestCodec } from './codec.js';
import { Manifest } from './manifest.js';
import type { ManifestCodec, ManifestContext } from './types.js';

export interface ManifestStoreOptions {
  context: ManifestContext;
  codec?: ManifestCodec;
}

export interface LoadOptions {
  /** Root of the described tree; overrides the root stored in the file */
  root?: string;
}

export class ManifestStore {
  private readonly context: ManifestContext;
  private readonly codec: ManifestCodec;
  private readonly logger: Logger;

  constructor(options: ManifestStoreOptions) {
    this.context = options.context;
    this.codec = options.codec ?? jsonManifestCodec;
    this.logger = options.context.logger.child({ component: 'manifest-store' });
  }

  /**
   * Turn a manifest location into the location of the manifest file,
   * appending the configured manifest name to directories.
   */
  async resolveManifestLocation(location: string): Promise<string> {
    const { backend, path: nativePath } = this.context.resolver.resolve(location);
    const isDirectory = /[\\/]$/.test(location) || (await backend.stat(nativePath))?.kind === 'directory';
    const filePath = isDirectory ? backend.join(nativePath, this.context.config.manifestName) : nativePath;
    return formatLocation(backend, filePath);
  }

  /** Root assumed for a manifest file that does not record one: its directory */
  defaultRoot(manifestLocation: string): string {
    const { backend, path: nativePath } = this.context.resolver.resolve(manifestLocation);
    return formatLocation(backend, backend.dirname(nativePath));
  }

  async exists(location: string): Promise<boolean> {
    const manifestLocation = await this.resolveManifestLocation(location);
    const { backend, path: nativePath } = this.context.resolver.resolve(manifestLocation);
    return (await backend.stat(nativePath))?.kind === 'file';
  }

  /**
   * @throws ManifestNotFoundError if there is no manifest at the location
   * @throws MalformedManifestError if the file cannot be decoded
   */
  async load(location: string, options: LoadOptions = {}): Promise<Manifest> {
    const manifestLocation = await this.resolveManifestLocation(location);
    const { backend, path: nativePath } = this.context.resolver.resolve(manifestLocation);

    if ((await backend.stat(nativePath))?.kind !== 'file') {
      throw new ManifestNotFoundError(manifestLocation);
    }

    const document = this.codec.decode(await backend.read(nativePath), manifestLocation);
    const registry = this.context.registry ?? defaultHashRegistry;
    if (registry.has(document.algorithm)) {
      document.algorithm = registry.resolve(document.algorithm);
    }

    const root = options.root ?? document.root ?? this.defaultRoot(manifestLocation);
    const fileName = backend.basename(nativePath);
    const context: ManifestContext =
      fileName === this.context.config.manifestName ? this.context : { ...this.context, outputManifestName: fileName };

    this.logger.debug(
      { location: manifestLocation, root, files: Object.keys(document.files).length },
      'Loaded manifest',
    );

    return Manifest.fromDocument(document, { root, context });
  }

  /** Like load(), but a missing manifest gives null */
  async tryLoad(location: string, options: LoadOptions = {}): Promise<Manifest | null> {
    try {
      return await this.load(location, options);
    } catch (err) {
      if (err instanceof ManifestNotFoundError) {
        return null;
      }
      throw err;
    }
  }

  /**
   * Write the manifest atomically. Defaults to the configured manifest
   * name inside the manifest's root.
   *
   * @returns the location written
   */
  async save(manifest: Manifest, location?: string): Promise<string> {
    if (location === undefined && manifest.root === '') {
      throw new InvalidPathError(manifest.root, 'manifest has no root to save into');
    }
    const target = location ?? this.context.resolver.resolve(manifest.root).uri.replace(/[\\/]*$/, '/');
    const manifestLocation = await this.resolveManifestLocation(target);
    const { backend, path: nativePath } = this.context.resolver.resolve(manifestLocation);

    await backend.write(nativePath, this.codec.encode(manifest.toDocument()));

    this.logger.info({ location: manifestLocation, files: manifest.size }, 'Saved manifest');
    return manifestLocation;
  }
}
