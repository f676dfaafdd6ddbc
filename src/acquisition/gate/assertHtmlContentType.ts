import { HTML_CONTENT_TYPE } from "../../config";
import { UnsupportedContentTypeError } from "../../utils/errors";

/**
 * Whether a Content-Type header value announces HTML. This is a plain,
 * case-sensitive substring test: `text/html; charset=utf-8` passes, as does
 * anything else that contains `text/html`.
 */
export function isHtmlContentType(contentType: string | undefined): boolean {
  return contentType?.includes(HTML_CONTENT_TYPE) ?? false;
}

/**
 * @throws {UnsupportedContentTypeError} If the header does not announce HTML
 */
export function assertHtmlContentType(contentType: string | undefined): void {
  if (!isHtmlContentType(contentType)) {
    throw new UnsupportedContentTypeError(contentType);
  }
}
