import { describe, expect, it, vi } from "vitest";
import { UnsupportedContentTypeError } from "../../utils/errors";
import { assertHtmlContentType, isHtmlContentType } from "./assertHtmlContentType";

vi.mock("../../utils/logger");

describe("media-type gate", () => {
  it.each(["text/html", "text/html; charset=utf-8", "text/html;charset=ISO-8859-1"])(
    "should accept %j",
    (contentType) => {
      expect(isHtmlContentType(contentType)).toBe(true);
      expect(() => assertHtmlContentType(contentType)).not.toThrow();
    },
  );

  it.each(["text/plain", "application/json", "application/xhtml+xml", "image/png", ""])(
    "should reject %j",
    (contentType) => {
      expect(isHtmlContentType(contentType)).toBe(false);
      expect(() => assertHtmlContentType(contentType)).toThrow(UnsupportedContentTypeError);
    },
  );

  it("should reject a missing content type", () => {
    expect(() => assertHtmlContentType(undefined)).toThrow(
      "URL is not a HTML document (content-type: none)",
    );
  });

  it("should carry the rejected value", () => {
    try {
      assertHtmlContentType("text/plain; charset=utf-8");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedContentTypeError);
      expect(error).toMatchObject({
        contentType: "text/plain; charset=utf-8",
        stage: "gate",
      });
    }
  });

  // Substring matching, kept as is: these show where it differs from a media-type parse
  describe("substring semantics", () => {
    it("should be case-sensitive", () => {
      expect(isHtmlContentType("TEXT/HTML")).toBe(false);
      expect(isHtmlContentType("Text/Html; charset=utf-8")).toBe(false);
    });

    it("should accept values that merely contain the token", () => {
      expect(isHtmlContentType("text/html-sandboxed")).toBe(true);
      expect(isHtmlContentType("application/json, text/html")).toBe(true);
    });
  });
});
