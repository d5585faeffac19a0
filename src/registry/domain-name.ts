/**
 * Host-name normalization shared by the registry and the scorer.
 *
 * "https://WWW.Example.org:8443/grants?id=1" -> "example.org"
 */

import { InvalidUrlError, type OperationResult } from '../shared/errors.js';
import { isBlank } from '../shared/utils.js';

/**
 * Extracts the normalized domain name from a URL: lower-cased, without
 * scheme, port, path, trailing dot or leading `www.`.
 *
 * Fails for blank input, strings the URL parser rejects (including
 * scheme-less "example.org/path"), and URLs without a host such as
 * `file:///tmp/x` or `mailto:` links.
 */
export function extractDomainName(url: string): OperationResult<string, InvalidUrlError> {
  if (isBlank(url)) {
    return { success: false, error: new InvalidUrlError('URL is blank', url) };
  }

  let hostname: string;
  try {
    hostname = new URL(url.trim()).hostname;
  } catch {
    return { success: false, error: new InvalidUrlError('URL could not be parsed', url) };
  }

  const name = normalizeDomainName(hostname);
  if (name.length === 0) {
    return { success: false, error: new InvalidUrlError('URL has no host', url) };
  }

  return { success: true, value: name };
}

/**
 * Normalizes a bare host name the same way `extractDomainName` does.
 * Used for names typed by operators ("WWW.Example.ORG." -> "example.org").
 */
export function normalizeDomainName(host: string): string {
  return host
    .trim()
    .toLowerCase()
    .replace(/\.+$/, '')
    .replace(/^www\./, '');
}
