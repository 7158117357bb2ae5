export interface SiteFile {
  /** POSIX path relative to the site root, without a leading slash */
  readonly path: string;
  readonly body: Uint8Array;
  readonly contentType: string;
}

/** Site files ordered by path. */
export type SiteTree = readonly SiteFile[];

export interface RemoteObject {
  readonly key: string;
  readonly etag?: string;
}

export interface Renderer {
  build(): Promise<SiteTree>;
}

export interface ObjectStore {
  bucketExists(bucket: string): Promise<boolean>;
  listObjects(bucket: string): Promise<RemoteObject[]>;
  putObject(bucket: string, file: SiteFile): Promise<void>;
  deleteObjects(bucket: string, keys: readonly string[]): Promise<void>;
}

export interface Cdn {
  /** Resolves to the invalidation id. */
  invalidate(distributionId: string, paths: readonly string[]): Promise<string>;
}

export interface ParamStore {
  /** Rejects with ConfigurationMissing when the key does not exist. */
  get(key: string): Promise<string>;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
