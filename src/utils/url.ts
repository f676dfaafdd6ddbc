import { InvalidUrlError } from "./errors";

/**
 * Parses an absolute request URL.
 * The URL needs a scheme and a non-empty host; relative references,
 * `mailto:` style URLs and `file:///` paths are rejected.
 * @throws {InvalidUrlError} If the URL is malformed or has no host
 */
export function validateUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new InvalidUrlError(url, error instanceof Error ? error : undefined);
  }

  if (parsed.host === "") {
    throw new InvalidUrlError(url);
  }

  return parsed;
}

/**
 * Validates a page URL given either as a string or as a parsed URL. Parsed
 * URLs are held to the same host requirement.
 */
export function resolvePageUrl(url: URL | string): URL {
  if (typeof url === "string") {
    return validateUrl(url);
  }
  if (url.host === "") {
    throw new InvalidUrlError(url.href);
  }
  return url;
}
