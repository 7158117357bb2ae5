import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import * as path from 'path';
import { contentTypeFor } from './content-type.js';
import type { SiteFile, SiteTree } from './types.js';

async function listFiles(root: string, dir = ''): Promise<string[]> {
  const entries = await readdir(path.join(root, dir), { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const relative = dir ? `${dir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...await listFiles(root, relative));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }

  return files;
}

export function sortSiteTree(files: readonly SiteFile[]): SiteTree {
  return [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/** Reads every regular file under `root` into a site tree. */
export async function readSiteTree(root: string): Promise<SiteTree> {
  const files = await listFiles(root);
  const tree: SiteFile[] = [];

  for (const file of files) {
    tree.push({
      path: file,
      body: await readFile(path.join(root, file)),
      contentType: contentTypeFor(file),
    });
  }

  return sortSiteTree(tree);
}

/** Replaces the contents of `root` with the site tree. */
export async function writeSiteTree(tree: SiteTree, root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });

  for (const file of tree) {
    const target = path.join(root, ...file.path.split('/'));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, file.body);
  }
}
