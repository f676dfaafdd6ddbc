import { JSDOM, VirtualConsole } from "jsdom";
import { logger } from "./logger";

/**
 * Builds a JSDOM for a page with scripts disabled. The page URL becomes the
 * document URL so relative links resolve against it.
 */
export function loadDocument(html: string, pageUrl: URL): JSDOM {
  const virtualConsole = new VirtualConsole();
  // Unparsable stylesheets and the like; not actionable for extraction
  virtualConsole.on("jsdomError", (error) => {
    logger.debug(`jsdom reported an error for ${pageUrl.href}: ${error.message}`);
  });

  return new JSDOM(html, {
    url: pageUrl.href,
    contentType: "text/html",
    virtualConsole,
  });
}

/**
 * Serializes a document including its doctype.
 */
export function serializeDocument(document: Document): string {
  const doctype = document.doctype ? `<!DOCTYPE ${document.doctype.name}>` : "";
  return `${doctype}${document.documentElement.outerHTML}`;
}
