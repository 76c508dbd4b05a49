import { DEFAULT_BASE_URL_MARKER } from './config';

export interface NormalizeOptions {
  /**
   * Prefix removed from the start of the template. Defaults to `{+baseurl}`.
   */
  baseUrlMarker?: string;
}

const placeholderPattern = /\{([^{}]+)\}/g;

/**
 * Canonicalizes a generator URL template so that templates with the same
 * literal segments and the same parameter positions compare equal, whatever
 * the parameters are called.
 *
 * @example
 * normalizeUrlTemplate('{+baseurl}/api/funds/{fund%2Did}{?select,expand}');
 * // '/api/funds/{pathParam1}{?queryParam1,queryParam2}'
 */
export function normalizeUrlTemplate(template: string, options?: NormalizeOptions): string {
  if (!template) {
    return '/';
  }

  const withoutMarker = stripBaseUrlMarker(
    template,
    options?.baseUrlMarker ?? DEFAULT_BASE_URL_MARKER,
  );

  let pathIndex = 0;
  let queryIndex = 0;
  const tokenized = withoutMarker.replace(placeholderPattern, (_match, inner: string) => {
    if (inner.startsWith('?')) {
      const tokens = splitQueryNames(inner.slice(1)).map(() => {
        queryIndex += 1;
        return `queryParam${queryIndex}`;
      });
      return `{?${tokens.join(',')}}`;
    }
    pathIndex += 1;
    return `{pathParam${pathIndex}}`;
  });

  return tokenized.startsWith('/') ? tokenized : `/${tokenized}`;
}

/**
 * Compares two normalized templates.
 */
export function templatesEqual(
  left: string,
  right: string,
  options?: { ignoreCase?: boolean },
): boolean {
  if (options?.ignoreCase ?? true) {
    return left.toLowerCase() === right.toLowerCase();
  }
  return left === right;
}

function stripBaseUrlMarker(template: string, marker: string): string {
  if (!marker || !template.startsWith(marker)) {
    return template;
  }
  return template.slice(marker.length);
}

function splitQueryNames(list: string): string[] {
  return list
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}
