export interface UrlResolverConfig {
  /** File name served for directory-style paths (e.g., 'index.html') */
  readonly defaultDocument: string;
}

export const defaultResolverConfig: UrlResolverConfig = {
  defaultDocument: 'index.html',
};

/**
 * Maps a request path to the object path that should be fetched from origin.
 *
 * Any path containing a dot is treated as a file reference and passes through,
 * including paths like `/v1.0/guide` where the dot is in a directory segment.
 */
export function resolveRequestPath(
  path: string,
  config: UrlResolverConfig = defaultResolverConfig,
): string {
  if (path.includes('.')) {
    return path;
  }

  if (path.endsWith('/')) {
    return path + config.defaultDocument;
  }

  return path + '/' + config.defaultDocument;
}

/** Bucket keys carry no leading slash. */
export function toObjectKey(resolvedPath: string): string {
  return resolvedPath.replace(/^\/+/, '');
}

export function generateUrlRewriteFunctionCode(
  config: UrlResolverConfig = defaultResolverConfig,
): string {
  return `
var DEFAULT_DOCUMENT = ${JSON.stringify(config.defaultDocument)};

function handler(event) {
  var request = event.request;
  var uri = request.uri;

  if (uri.indexOf('.') !== -1) {
    return request;
  }

  if (uri.charAt(uri.length - 1) === '/') {
    request.uri = uri + DEFAULT_DOCUMENT;
  } else {
    request.uri = uri + '/' + DEFAULT_DOCUMENT;
  }

  return request;
}
`;
}
