import { Readable } from "node:stream";
import axios, { AxiosError, type AxiosInstance } from "axios";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { CancelledError, FetchError } from "../../utils/errors";
import { HttpTransport } from "./HttpTransport";
import { buildRequest } from "./request";

vi.mock("axios", async (importOriginal) => {
  const actual = await importOriginal<typeof import("axios")>();
  return {
    ...actual,
    default: { ...actual.default, create: vi.fn() },
  };
});
vi.mock("../../utils/logger");

const mockedCreate = vi.mocked(axios.create);
const request = vi.fn();

describe("HttpTransport", () => {
  const pageUrl = new URL("https://example.com/article");

  beforeEach(() => {
    request.mockReset();
    mockedCreate.mockReset();
    mockedCreate.mockReturnValue({ request } as unknown as AxiosInstance);
  });

  it("should send one GET advertising gzip with a streamed, undecoded body", async () => {
    request.mockResolvedValue({
      status: 200,
      data: Readable.from(["<html></html>"]),
      headers: { "content-type": "text/html" },
    });

    await new HttpTransport().execute(buildRequest(pageUrl), { timeout: 1500 });

    expect(mockedCreate).toHaveBeenCalledWith({ timeout: 1500, maxRedirects: 5 });
    expect(request).toHaveBeenCalledTimes(1);
    expect(request).toHaveBeenCalledWith({
      method: "GET",
      url: "https://example.com/article",
      headers: { "Accept-Encoding": "gzip", Accept: false, "User-Agent": false },
      responseType: "stream",
      decompress: false,
      validateStatus: expect.any(Function),
      signal: undefined,
    });
  });

  it("should accept every HTTP status", async () => {
    request.mockResolvedValue({ status: 200, data: Readable.from([]), headers: {} });

    await new HttpTransport().execute(buildRequest(pageUrl), { timeout: 1000 });

    const config = request.mock.calls[0][0];
    expect(config.validateStatus(404)).toBe(true);
    expect(config.validateStatus(503)).toBe(true);
  });

  it("should return the body and the headers of interest", async () => {
    const body = Readable.from(["payload"]);
    request.mockResolvedValue({
      status: 404,
      data: body,
      headers: {
        "content-type": "text/html; charset=utf-8",
        "content-encoding": "gzip",
      },
    });

    const response = await new HttpTransport().execute(buildRequest(pageUrl), {
      timeout: 1000,
    });

    expect(response.status).toBe(404);
    expect(response.body).toBe(body);
    expect(response.url.href).toBe("https://example.com/article");
    expect(response.contentType).toBe("text/html; charset=utf-8");
    expect(response.contentEncoding).toBe("gzip");
  });

  it("should leave absent headers undefined", async () => {
    request.mockResolvedValue({ status: 200, data: Readable.from([]), headers: {} });

    const response = await new HttpTransport().execute(buildRequest(pageUrl), {
      timeout: 1000,
    });

    expect(response.contentType).toBeUndefined();
    expect(response.contentEncoding).toBeUndefined();
  });

  it("should create a fresh client for every call", async () => {
    request.mockResolvedValue({ status: 200, data: Readable.from([]), headers: {} });
    const transport = new HttpTransport();

    await transport.execute(buildRequest(pageUrl), { timeout: 100 });
    await transport.execute(buildRequest(pageUrl), { timeout: 200 });

    expect(mockedCreate).toHaveBeenCalledTimes(2);
    expect(mockedCreate).toHaveBeenNthCalledWith(2, { timeout: 200, maxRedirects: 5 });
  });

  it("should pass the abort signal to axios", async () => {
    request.mockResolvedValue({ status: 200, data: Readable.from([]), headers: {} });
    const controller = new AbortController();

    await new HttpTransport().execute(buildRequest(pageUrl), {
      timeout: 1000,
      signal: controller.signal,
    });

    expect(request.mock.calls[0][0].signal).toBe(controller.signal);
  });

  it("should classify a timeout as a timed out FetchError", async () => {
    request.mockRejectedValue(new AxiosError("timeout of 50ms exceeded", "ECONNABORTED"));

    const result = new HttpTransport().execute(buildRequest(pageUrl), { timeout: 50 });

    await expect(result).rejects.toBeInstanceOf(FetchError);
    await expect(result).rejects.toMatchObject({
      code: "ECONNABORTED",
      timedOut: true,
      stage: "transport",
      url: "https://example.com/article",
    });
  });

  it("should classify ETIMEDOUT as a timeout as well", async () => {
    request.mockRejectedValue(new AxiosError("connect ETIMEDOUT", "ETIMEDOUT"));

    await expect(
      new HttpTransport().execute(buildRequest(pageUrl), { timeout: 50 }),
    ).rejects.toMatchObject({ code: "ETIMEDOUT", timedOut: true });
  });

  it("should classify DNS failures as FetchError without timeout", async () => {
    request.mockRejectedValue(
      new AxiosError("getaddrinfo ENOTFOUND example.invalid", "ENOTFOUND"),
    );

    await expect(
      new HttpTransport().execute(buildRequest(pageUrl), { timeout: 1000 }),
    ).rejects.toMatchObject({
      name: "FetchError",
      code: "ENOTFOUND",
      timedOut: false,
      message: "Failed to fetch https://example.com/article: getaddrinfo ENOTFOUND example.invalid",
    });
  });

  it("should classify an aborted request as CancelledError", async () => {
    request.mockRejectedValue(new AxiosError("canceled", "ERR_CANCELED"));

    await expect(
      new HttpTransport().execute(buildRequest(pageUrl), { timeout: 1000 }),
    ).rejects.toBeInstanceOf(CancelledError);
  });

  it("should wrap unexpected rejections in FetchError", async () => {
    request.mockRejectedValue(new Error("socket hang up"));

    await expect(
      new HttpTransport().execute(buildRequest(pageUrl), { timeout: 1000 }),
    ).rejects.toMatchObject({
      name: "FetchError",
      timedOut: false,
      message: "Failed to fetch https://example.com/article: socket hang up",
    });
  });
});
