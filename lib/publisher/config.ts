import { z } from 'zod';
import { PublishError } from './errors.js';

export const rendererKinds = ['markdown', 'mkdocs'] as const;
export type RendererKind = (typeof rendererKinds)[number];

const namespaceSegment = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9-]*$/, 'must be lowercase letters, digits and dashes');

const publisherEnvSchema = z.object({
  DOCS_PROJECT: namespaceSegment.default('hla-compass'),
  ENVIRONMENT: namespaceSegment.default('dev'),
  DOCS_RENDERER: z.enum(rendererKinds).default('markdown'),
  DOCS_SOURCE_DIR: z.string().min(1).default('docs'),
  DOCS_SITE_DIR: z.string().min(1).default('site'),
  DOCS_DOMAIN: z.string().min(1).optional(),
});

export interface PublisherConfig {
  readonly project: string;
  readonly environment: string;
  readonly renderer: RendererKind;
  readonly sourceDir: string;
  readonly siteDir: string;
  /** Only used in log lines. */
  readonly domain?: string;
}

export function loadPublisherConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<PublisherConfig> = {},
): PublisherConfig {
  const parsed = publisherEnvSchema.safeParse({
    DOCS_PROJECT: overrides.project ?? emptyToUndefined(env.DOCS_PROJECT),
    ENVIRONMENT: overrides.environment ?? emptyToUndefined(env.ENVIRONMENT),
    DOCS_RENDERER: overrides.renderer ?? emptyToUndefined(env.DOCS_RENDERER),
    DOCS_SOURCE_DIR: overrides.sourceDir ?? emptyToUndefined(env.DOCS_SOURCE_DIR),
    DOCS_SITE_DIR: overrides.siteDir ?? emptyToUndefined(env.DOCS_SITE_DIR),
    DOCS_DOMAIN: overrides.domain ?? emptyToUndefined(env.DOCS_DOMAIN),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new PublishError('configure', `Invalid publisher configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    project: values.DOCS_PROJECT,
    environment: values.ENVIRONMENT,
    renderer: values.DOCS_RENDERER,
    sourceDir: values.DOCS_SOURCE_DIR,
    siteDir: values.DOCS_SITE_DIR,
    domain: values.DOCS_DOMAIN,
  };
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

export interface ParameterKeys {
  readonly bucket: string;
  readonly distributionId: string;
}

export function parameterKeys(project: string, environment: string): ParameterKeys {
  const prefix = `/${project}/${environment}/docs`;
  return {
    bucket: `${prefix}/s3-bucket`,
    distributionId: `${prefix}/cloudfront-distribution-id`,
  };
}
