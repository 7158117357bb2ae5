import * as path from 'path';
import yargs from 'yargs';
import { CloudFrontCdn } from './aws/cloudfront-cdn.js';
import { S3ObjectStore } from './aws/s3-object-store.js';
import { SsmParamStore } from './aws/ssm-param-store.js';
import { loadPublisherConfig, rendererKinds, type PublisherConfig, type RendererKind } from './config.js';
import { PublishError, errorMessage } from './errors.js';
import { MarkdownRenderer } from './markdown-renderer.js';
import { MkDocsRenderer } from './mkdocs-renderer.js';
import { defaultInvalidationPaths, publishSite, type PublishDependencies } from './pipeline.js';
import type { Logger, Renderer } from './types.js';

export interface PublishArgs {
  project?: string;
  environment?: string;
  renderer?: RendererKind;
  source?: string;
  out?: string;
  domain?: string;
  paths?: string[];
  dryRun?: boolean;
}

export interface PublishRuntime {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  readonly logger: Logger;
  readonly createDependencies: (config: PublisherConfig, cwd: string, logger: Logger) => PublishDependencies;
}

export function createRenderer(config: PublisherConfig, cwd: string): Renderer {
  if (config.renderer === 'mkdocs') {
    return new MkDocsRenderer({ projectDir: cwd, siteDir: config.siteDir });
  }
  return new MarkdownRenderer({
    sourceDir: path.resolve(cwd, config.sourceDir),
    outDir: path.resolve(cwd, config.siteDir),
  });
}

export function createAwsDependencies(
  config: PublisherConfig,
  cwd: string,
  logger: Logger,
): PublishDependencies {
  return {
    renderer: createRenderer(config, cwd),
    objectStore: new S3ObjectStore(),
    cdn: new CloudFrontCdn(),
    paramStore: new SsmParamStore(),
    logger,
  };
}

/** Resolves to the process exit code. */
export async function runPublishCommand(args: PublishArgs, runtime: PublishRuntime): Promise<number> {
  const { logger } = runtime;
  try {
    const config = loadPublisherConfig(runtime.env, {
      project: args.project,
      environment: args.environment,
      renderer: args.renderer,
      sourceDir: args.source,
      siteDir: args.out,
      domain: args.domain,
    });
    const deps = runtime.createDependencies(config, runtime.cwd, logger);

    await publishSite(deps, {
      project: config.project,
      environment: config.environment,
      domain: config.domain,
      dryRun: args.dryRun,
      invalidationPaths: args.paths && args.paths.length > 0 ? args.paths : defaultInvalidationPaths,
    });
    return 0;
  } catch (error) {
    if (error instanceof PublishError) {
      logger.error(`Publish failed during ${error.stage} stage: ${error.message}`);
    } else {
      logger.error(`Publish failed: ${errorMessage(error)}`);
    }
    return 1;
  }
}

export async function main(argv: string[]): Promise<void> {
  const args = await yargs(argv)
    .scriptName('publish-docs')
    .usage('$0 [options]\n\nBuild the documentation site, sync it to S3 and invalidate CloudFront.')
    .options({
      project: { type: 'string', describe: 'Parameter store namespace (DOCS_PROJECT)' },
      environment: { type: 'string', alias: 'e', describe: 'Target environment (ENVIRONMENT)' },
      renderer: { choices: rendererKinds, describe: 'Site generator (DOCS_RENDERER)' },
      source: { type: 'string', describe: 'Markdown source directory (DOCS_SOURCE_DIR)' },
      out: { type: 'string', describe: 'Rendered site directory (DOCS_SITE_DIR)' },
      domain: { type: 'string', describe: 'Public docs domain, for log output (DOCS_DOMAIN)' },
      paths: { type: 'string', array: true, describe: 'Paths to invalidate (default /*)' },
      'dry-run': { type: 'boolean', default: false, describe: 'Show what would change without writing' },
    })
    .strict()
    .help()
    .parseAsync();

  process.exitCode = await runPublishCommand(
    {
      project: args.project,
      environment: args.environment,
      renderer: args.renderer,
      source: args.source,
      out: args.out,
      domain: args.domain,
      paths: args.paths,
      dryRun: args.dryRun,
    },
    {
      env: process.env,
      cwd: process.cwd(),
      logger: console,
      createDependencies: createAwsDependencies,
    },
  );
}
