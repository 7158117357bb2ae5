import { createHash } from 'node:crypto';
import type { Logger, ObjectStore, RemoteObject, SiteFile, SiteTree } from './types.js';

export interface MirrorPlan {
  readonly uploads: SiteFile[];
  readonly deletes: string[];
  readonly unchanged: string[];
}

export interface MirrorResult {
  readonly uploaded: string[];
  readonly deleted: string[];
  readonly unchanged: number;
  readonly dryRun: boolean;
}

export interface MirrorOptions {
  readonly dryRun?: boolean;
  readonly logger?: Logger;
}

/** S3 reports the MD5 of single-part uploads as a quoted hex ETag. */
export function etagFor(body: Uint8Array): string {
  return `"${createHash('md5').update(body).digest('hex')}"`;
}

export function planMirror(tree: SiteTree, remote: readonly RemoteObject[]): MirrorPlan {
  const remoteEtags = new Map<string, string | undefined>();
  for (const object of remote) {
    remoteEtags.set(object.key, object.etag);
  }

  const uploads: SiteFile[] = [];
  const unchanged: string[] = [];
  const local = new Set<string>();

  for (const file of tree) {
    local.add(file.path);
    const etag = remoteEtags.get(file.path);
    if (etag !== undefined && etag === etagFor(file.body)) {
      unchanged.push(file.path);
    } else {
      uploads.push(file);
    }
  }

  const deletes = remote
    .map((object) => object.key)
    .filter((key) => !local.has(key))
    .sort();

  return { uploads, deletes, unchanged };
}

/**
 * Makes the bucket's object set equal to the site tree: creates missing keys,
 * overwrites changed ones, deletes the rest.
 */
export async function mirrorSiteTree(
  store: ObjectStore,
  tree: SiteTree,
  bucket: string,
  options: MirrorOptions = {},
): Promise<MirrorResult> {
  const logger = options.logger ?? console;
  const dryRun = options.dryRun ?? false;
  const plan = planMirror(tree, await store.listObjects(bucket));

  for (const file of plan.uploads) {
    if (dryRun) {
      logger.log(`(dryrun) upload: ${file.path} to s3://${bucket}/${file.path}`);
      continue;
    }
    await store.putObject(bucket, file);
    logger.log(`upload: ${file.path} to s3://${bucket}/${file.path}`);
  }

  for (const key of plan.deletes) {
    logger.log(`${dryRun ? '(dryrun) ' : ''}delete: s3://${bucket}/${key}`);
  }
  if (!dryRun && plan.deletes.length > 0) {
    await store.deleteObjects(bucket, plan.deletes);
  }

  return {
    uploaded: plan.uploads.map((file) => file.path),
    deleted: plan.deletes,
    unchanged: plan.unchanged.length,
    dryRun,
  };
}
