import { parameterKeys } from './config.js';
import {
  BuildFailure,
  ConfigurationMissing,
  InvalidationFailure,
  PublishError,
  SyncFailure,
  errorMessage,
} from './errors.js';
import { mirrorSiteTree, type MirrorResult } from './mirror.js';
import type { Cdn, Logger, ObjectStore, ParamStore, Renderer, SiteTree } from './types.js';

export interface PublishDependencies {
  readonly renderer: Renderer;
  readonly objectStore: ObjectStore;
  readonly cdn: Cdn;
  readonly paramStore: ParamStore;
  readonly logger?: Logger;
}

export interface PublishOptions {
  readonly project: string;
  readonly environment: string;
  /** Paths purged from the CDN cache after a successful sync. */
  readonly invalidationPaths?: readonly string[];
  readonly dryRun?: boolean;
  readonly domain?: string;
}

export type InvalidationOutcome =
  | { readonly status: 'completed'; readonly distributionId: string; readonly invalidationId: string }
  | { readonly status: 'skipped'; readonly reason: string }
  | { readonly status: 'failed'; readonly distributionId: string; readonly reason: string };

export interface PublishResult {
  readonly bucket: string;
  readonly files: number;
  readonly sync: MirrorResult;
  readonly invalidation: InvalidationOutcome;
}

export const defaultInvalidationPaths: readonly string[] = ['/*'];

export async function buildSite(renderer: Renderer): Promise<SiteTree> {
  try {
    return await renderer.build();
  } catch (error) {
    if (error instanceof BuildFailure) {
      throw error;
    }
    throw new BuildFailure(errorMessage(error), { cause: error });
  }
}

export async function syncSite(
  store: ObjectStore,
  tree: SiteTree,
  bucket: string,
  options: { dryRun?: boolean; logger?: Logger } = {},
): Promise<MirrorResult> {
  let exists: boolean;
  try {
    exists = await store.bucketExists(bucket);
  } catch (error) {
    throw new SyncFailure(errorMessage(error), { cause: error });
  }
  if (!exists) {
    throw new SyncFailure(
      `Bucket ${bucket} does not exist. Deploy the DocsSite stack to create it first.`,
    );
  }

  try {
    return await mirrorSiteTree(store, tree, bucket, options);
  } catch (error) {
    if (error instanceof SyncFailure) {
      throw error;
    }
    throw new SyncFailure(errorMessage(error), { cause: error });
  }
}

export async function invalidateCache(
  cdn: Cdn,
  distributionId: string,
  paths: readonly string[] = defaultInvalidationPaths,
): Promise<string> {
  try {
    return await cdn.invalidate(distributionId, paths);
  } catch (error) {
    throw new InvalidationFailure(errorMessage(error), { cause: error });
  }
}

async function resolveBucket(paramStore: ParamStore, key: string): Promise<string> {
  try {
    return await paramStore.get(key);
  } catch (error) {
    if (error instanceof PublishError) {
      throw error;
    }
    throw new PublishError('configure', errorMessage(error), { cause: error });
  }
}

/**
 * Builds the site, mirrors it into the bucket and purges the CDN cache.
 *
 * Build and sync failures reject. A missing distribution id or a failed
 * invalidation is logged as a warning and reported in the result.
 */
export async function publishSite(
  deps: PublishDependencies,
  options: PublishOptions,
): Promise<PublishResult> {
  const logger = deps.logger ?? console;
  const keys = parameterKeys(options.project, options.environment);

  logger.log('Building documentation...');
  const tree = await buildSite(deps.renderer);
  logger.log(`Built ${tree.length} files.`);

  logger.log(`Deploying to ${options.environment} environment...`);
  const bucket = await resolveBucket(deps.paramStore, keys.bucket);

  logger.log(`Syncing files to s3://${bucket}...`);
  const sync = await syncSite(deps.objectStore, tree, bucket, {
    dryRun: options.dryRun,
    logger,
  });
  logger.log(
    `Synced: ${sync.uploaded.length} uploaded, ${sync.deleted.length} deleted, ${sync.unchanged} unchanged.`,
  );

  const invalidation = await runInvalidation(deps, keys.distributionId, options, logger);
  if (invalidation.status === 'completed') {
    const target = options.domain ? ` at https://${options.domain}` : '';
    logger.log(`Deployment complete! Docs should be available shortly${target}.`);
  }

  return { bucket, files: tree.length, sync, invalidation };
}

async function runInvalidation(
  deps: PublishDependencies,
  distributionKey: string,
  options: PublishOptions,
  logger: Logger,
): Promise<InvalidationOutcome> {
  if (options.dryRun) {
    logger.log('Dry run: cache invalidation skipped.');
    return { status: 'skipped', reason: 'dry run' };
  }

  logger.log('Checking for CloudFront distribution ID...');
  let distributionId: string;
  try {
    distributionId = await deps.paramStore.get(distributionKey);
  } catch (error) {
    const reason = error instanceof ConfigurationMissing
      ? `Could not find CloudFront distribution ID in SSM parameter ${distributionKey}.`
      : `Could not read SSM parameter ${distributionKey}: ${errorMessage(error)}`;
    logger.warn(`Warning: ${reason}`);
    logger.warn('Cache invalidation skipped. You may not see changes immediately.');
    return { status: 'skipped', reason };
  }

  logger.log(`Invalidating CloudFront cache for distribution ${distributionId}...`);
  try {
    const paths = options.invalidationPaths ?? defaultInvalidationPaths;
    const invalidationId = await invalidateCache(deps.cdn, distributionId, paths);
    logger.log(`Created invalidation ${invalidationId}.`);
    return { status: 'completed', distributionId, invalidationId };
  } catch (error) {
    const reason = errorMessage(error);
    logger.warn(`Warning: Cache invalidation failed: ${reason}`);
    logger.warn('Content is published; cached pages may stay stale until they expire.');
    return { status: 'failed', distributionId, reason };
  }
}
