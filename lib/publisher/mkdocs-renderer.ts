import { spawn } from 'node:child_process';
import * as path from 'path';
import { BuildFailure } from './errors.js';
import { readSiteTree } from './site-tree.js';
import type { Renderer, SiteTree } from './types.js';

export interface MkDocsRendererOptions {
  /** Directory holding mkdocs.yml */
  readonly projectDir: string;
  readonly siteDir: string;
  readonly command?: string;
  /** Replaces the default `build --strict --site-dir <siteDir>` arguments. */
  readonly args?: readonly string[];
}

/**
 * Runs `mkdocs build --strict`, so warnings fail the build, and reads the
 * generated site directory back into a tree.
 */
export class MkDocsRenderer implements Renderer {
  constructor(private readonly options: MkDocsRendererOptions) {}

  async build(): Promise<SiteTree> {
    const command = this.options.command ?? 'mkdocs';
    const siteDir = path.resolve(this.options.projectDir, this.options.siteDir);
    const args = this.options.args ?? ['build', '--strict', '--site-dir', siteDir];

    await this.run(command, args);
    return readSiteTree(siteDir);
  }

  private run(command: string, args: readonly string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: this.options.projectDir,
        stdio: ['ignore', 'inherit', 'pipe'],
      });
      let stderr = '';

      child.stderr.setEncoding('utf-8');
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
        process.stderr.write(chunk);
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          reject(new BuildFailure(
            `${command} could not be found. Install it with 'pip install mkdocs-material'.`,
            { cause: error },
          ));
          return;
        }
        reject(new BuildFailure(error.message, { cause: error }));
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        const detail = stderr.trim();
        reject(new BuildFailure(
          `${command} exited with code ${code}${detail ? `: ${detail}` : ''}`,
        ));
      });
    });
  }
}
