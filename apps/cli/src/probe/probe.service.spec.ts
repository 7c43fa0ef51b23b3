import { Readable } from "node:stream";
import { HttpService } from "@nestjs/axios";
import { ConfigService } from "@nestjs/config";
import { Test, type TestingModule } from "@nestjs/testing";
import { Observable, of, throwError } from "rxjs";
import { afterEach, describe, expect, it, vi } from "vitest";
import { measureHeaderBytes, ProbeService } from "./probe.service.js";

const { undiciRequestMock, MockAgent } = vi.hoisted(() => ({
  undiciRequestMock: vi.fn(),
  MockAgent: class {
    close = vi.fn(async () => undefined);
  },
}));

vi.mock("undici", () => ({
  Agent: MockAgent,
  request: undiciRequestMock,
}));

function bodyOf(...chunks: string[]): Readable {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk)));
}

function failingBody(prefix: string, message: string): Readable {
  return Readable.from(
    (async function* () {
      yield Buffer.from(prefix);
      throw new Error(message);
    })(),
  );
}

/** An axios call that only settles when its signal aborts. */
function hangingRequest(config: { signal: AbortSignal }): Observable<never> {
  return new Observable<never>((subscriber) => {
    const fail = () => subscriber.error(new Error("canceled"));
    if (config.signal.aborted) {
      fail();
      return;
    }
    config.signal.addEventListener("abort", fail, { once: true });
  });
}

describe("measureHeaderBytes", () => {
  it("adds name and value lengths for every header", () => {
    expect(
      measureHeaderBytes(
        Object.entries({
          "content-type": "text/plain",
          "set-cookie": ["a=1", "b=22"],
        }),
      ),
    ).toBe(12 + 10 + 10 + 3 + 4);
  });

  it("stringifies scalar values and skips absent ones", () => {
    expect(
      measureHeaderBytes(
        Object.entries({
          "content-length": 1234,
          "x-missing": undefined,
          "x-null": null,
        }),
      ),
    ).toBe(14 + 4);
  });
});

describe("ProbeService", () => {
  const mockHttpService = {
    request: vi.fn(),
  };

  const probeConfig = {
    timeoutMs: 5000,
    httpVersion: "1.1",
    maxRedirects: 10,
    userAgent: "loadprobe-test",
  };

  const mockConfigService = {
    get: vi.fn((key: string) => (key === "probe" ? probeConfig : undefined)),
  };

  afterEach(() => {
    vi.clearAllMocks();
  });

  const createService = async (): Promise<ProbeService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ProbeService,
        { provide: HttpService, useValue: mockHttpService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    return module.get<ProbeService>(ProbeService);
  };

  describe("HTTP/1.1", () => {
    it("counts header and body bytes of a complete reply", async () => {
      const service = await createService();
      mockHttpService.request.mockReturnValueOnce(
        of({
          status: 200,
          headers: { "content-type": "text/plain", "content-length": "5" },
          data: bodyOf("hel", "lo"),
        }),
      );

      const result = await service.probe("http://example.test/robots.txt");

      expect(result).toEqual({ statusCode: 200, replySize: 12 + 10 + 14 + 1 + 5 });
    });

    it("streams the reply and accepts every status", async () => {
      const service = await createService();
      mockHttpService.request.mockReturnValueOnce(of({ status: 200, headers: {}, data: bodyOf() }));

      await service.probe("http://example.test/");

      const config = mockHttpService.request.mock.calls[0][0];
      expect(config.method).toBe("GET");
      expect(config.url).toBe("http://example.test/");
      expect(config.responseType).toBe("stream");
      expect(config.maxRedirects).toBe(10);
      expect(config.headers).toEqual({ "User-Agent": "loadprobe-test" });
      expect(config.validateStatus(404)).toBe(true);
      expect(config.validateStatus(503)).toBe(true);
    });

    it("returns non-2xx statuses unchanged", async () => {
      const service = await createService();
      mockHttpService.request.mockReturnValueOnce(of({ status: 404, headers: {}, data: bodyOf("nope") }));

      await expect(service.probe("http://example.test/missing")).resolves.toEqual({
        statusCode: 404,
        replySize: 4,
      });
    });

    it("keeps the status and header bytes when the body cannot be read", async () => {
      const service = await createService();
      mockHttpService.request.mockReturnValueOnce(
        of({ status: 200, headers: { "x-a": "1" }, data: failingBody("abc", "socket hang up") }),
      );

      await expect(service.probe("http://example.test/")).resolves.toEqual({ statusCode: 200, replySize: 4 });
    });

    it("maps transport failures to a 500 with no size", async () => {
      const service = await createService();
      mockHttpService.request.mockReturnValueOnce(
        throwError(() => Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:1"), { code: "ECONNREFUSED" })),
      );

      await expect(service.probe("http://127.0.0.1:1/")).resolves.toEqual({ statusCode: 500, replySize: 0 });
    });

    it("turns an expired deadline into a failed probe", async () => {
      const service = await createService();
      mockHttpService.request.mockImplementationOnce(hangingRequest);

      await expect(service.probe("http://example.test/slow", { timeoutMs: 20 })).resolves.toEqual({
        statusCode: 500,
        replySize: 0,
      });
    });

    it("turns cancellation into a failed probe", async () => {
      const service = await createService();
      mockHttpService.request.mockImplementationOnce(hangingRequest);
      const controller = new AbortController();
      controller.abort();

      await expect(service.probe("http://example.test/", { signal: controller.signal })).resolves.toEqual({
        statusCode: 500,
        replySize: 0,
      });
    });
  });

  describe("HTTP/2", () => {
    it("uses undici with an HTTP/2-capable agent", async () => {
      const service = await createService();
      undiciRequestMock.mockResolvedValueOnce({
        statusCode: 200,
        headers: { "content-type": ["a", "b"] },
        body: bodyOf("xyz"),
      });

      const result = await service.probe("https://example.test/", { httpVersion: "2" });

      expect(result).toEqual({ statusCode: 200, replySize: 12 + 1 + 1 + 3 });
      expect(mockHttpService.request).not.toHaveBeenCalled();
      const [url, options] = undiciRequestMock.mock.calls[0];
      expect(url).toBe("https://example.test/");
      expect(options.method).toBe("GET");
      expect(options.headers).toEqual({ "user-agent": "loadprobe-test" });
      expect(options.dispatcher).toBeInstanceOf(MockAgent);
    });

    it("reuses one agent and closes it on shutdown", async () => {
      const service = await createService();
      undiciRequestMock.mockImplementation(async () => ({ statusCode: 204, headers: {}, body: bodyOf() }));

      await service.probe("https://example.test/a", { httpVersion: "2" });
      await service.probe("https://example.test/b", { httpVersion: "2" });

      const first = undiciRequestMock.mock.calls[0][1].dispatcher;
      expect(undiciRequestMock.mock.calls[1][1].dispatcher).toBe(first);

      await service.onModuleDestroy();
      expect(first.close).toHaveBeenCalledTimes(1);
      undiciRequestMock.mockReset();
    });

    it("maps undici failures to a 500 with no size", async () => {
      const service = await createService();
      undiciRequestMock.mockRejectedValueOnce(new Error("getaddrinfo ENOTFOUND nowhere.test"));

      await expect(service.probe("https://nowhere.test/", { httpVersion: "2" })).resolves.toEqual({
        statusCode: 500,
        replySize: 0,
      });
    });
  });
});
