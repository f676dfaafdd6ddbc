import { describe, expect, it, vi } from "vitest";
import { InvalidUrlError } from "./errors";
import { resolvePageUrl, validateUrl } from "./url";

vi.mock("./logger");

describe("validateUrl", () => {
  it("should parse absolute http and https URLs", () => {
    expect(validateUrl("https://example.com/a/b?c=d#e").href).toBe("https://example.com/a/b?c=d#e");
    expect(validateUrl("http://localhost:8080/").host).toBe("localhost:8080");
  });

  it("should accept other schemes that have an authority", () => {
    expect(validateUrl("ftp://example.com/file").protocol).toBe("ftp:");
  });

  it.each(["", "example.com", "/path/only", "//example.com/path", "http://", "not a url"])(
    "should reject unparsable input %j",
    (url) => {
      expect(() => validateUrl(url)).toThrow(InvalidUrlError);
    },
  );

  it.each(["mailto:someone@example.com", "file:///tmp/page.html", "data:text/html,hi"])(
    "should reject %j for having no host",
    (url) => {
      expect(() => validateUrl(url)).toThrow(`Invalid URL: ${url}`);
    },
  );

  it("should keep the parse failure as cause", () => {
    try {
      validateUrl("no scheme here");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidUrlError);
      expect(error).toMatchObject({ url: "no scheme here", stage: "validate" });
      expect(error instanceof InvalidUrlError && error.cause).toBeInstanceOf(TypeError);
    }
  });
});

describe("resolvePageUrl", () => {
  it("should return URL objects as they are", () => {
    const url = new URL("https://example.com/");

    expect(resolvePageUrl(url)).toBe(url);
  });

  it.each(["file:///tmp/page.html", "mailto:someone@example.com"])(
    "should reject a parsed %j for having no host",
    (url) => {
      expect(() => resolvePageUrl(new URL(url))).toThrow(`Invalid URL: ${url}`);
    },
  );

  it("should validate strings", () => {
    expect(resolvePageUrl("https://example.com/x").pathname).toBe("/x");
    expect(() => resolvePageUrl("x")).toThrow(InvalidUrlError);
  });
});
