import { describe, it, expect } from "vitest";
import { InvalidUrlError } from "../errors/catalog.js";
import { createLogger, type Logger } from "../logger/index.js";
import { parseStreamUrl, urlParse } from "./parse.js";

function captureLogger(): { logger: Logger; records: Array<Record<string, unknown>> } {
  const records: Array<Record<string, unknown>> = [];
  const logger = createLogger(
    { level: "info", pretty: false },
    {
      write(msg: string) {
        records.push(JSON.parse(msg));
      },
    },
  );
  return { logger, records };
}

function reasonOf(url: string): string {
  try {
    parseStreamUrl(url);
  } catch (err) {
    if (err instanceof InvalidUrlError) {
      return `${err.reason}: ${err.message}`;
    }
    throw err;
  }
  return "parsed";
}

describe("parseStreamUrl", () => {
  it("splits host, port and mount", () => {
    expect(parseStreamUrl("http://example.com:8000/mount.mp3")).toEqual({
      host: "example.com",
      port: 8000,
      mount: "/mount.mp3",
    });
  });

  it("keeps a bare slash as the mount", () => {
    expect(parseStreamUrl("http://127.0.0.1:80/")).toEqual({
      host: "127.0.0.1",
      port: 80,
      mount: "/",
    });
  });

  it("keeps everything after the port in the mount", () => {
    expect(parseStreamUrl("http://radio:8000/live/stream.ogg?x=1").mount).toBe(
      "/live/stream.ogg?x=1",
    );
  });

  it("accepts both ends of the port range", () => {
    expect(parseStreamUrl("http://h:1/m").port).toBe(1);
    expect(parseStreamUrl("http://h:65535/m").port).toBe(65535);
  });

  it("accepts leading zeros and a plus sign like strtonum", () => {
    expect(parseStreamUrl("http://h:08000/m").port).toBe(8000);
    expect(parseStreamUrl("http://h:+80/m").port).toBe(80);
  });

  it("rejects other schemes", () => {
    expect(reasonOf("ftp://example.com:8000/x")).toBe(
      "NOT_HTTP: invalid <url>: not an HTTP address",
    );
    expect(reasonOf("https://example.com:8000/x")).toBe(
      "NOT_HTTP: invalid <url>: not an HTTP address",
    );
  });

  it("rejects a URL without port", () => {
    expect(reasonOf("http://example.com/mount")).toBe(
      "MISSING_PORT: invalid <url>: missing port",
    );
  });

  it("rejects an empty host", () => {
    expect(reasonOf("http://:8000/mount")).toBe(
      "MISSING_HOST: invalid <url>: missing host",
    );
  });

  it("rejects a URL without mount", () => {
    expect(reasonOf("http://example.com:8000")).toBe(
      "MISSING_MOUNT: invalid <url>: mountpoint missing, or port number too long",
    );
  });

  it("rejects a port longer than five characters", () => {
    expect(reasonOf("http://example.com:123456/mount")).toBe(
      "MISSING_MOUNT: invalid <url>: mountpoint missing, or port number too long",
    );
  });

  it("rejects an out-of-range port", () => {
    expect(reasonOf("http://example.com:99999/mount")).toBe(
      "PORT_INVALID: invalid <url>: port: 99999 is too large",
    );
    expect(reasonOf("http://example.com:0/mount")).toBe(
      "PORT_INVALID: invalid <url>: port: 0 is too small",
    );
  });

  it("rejects a non-numeric or empty port", () => {
    expect(reasonOf("http://example.com:80a/mount")).toBe(
      "PORT_INVALID: invalid <url>: port: 80a is invalid",
    );
    expect(reasonOf("http://example.com:/mount")).toBe(
      "PORT_INVALID: invalid <url>: port:  is invalid",
    );
  });
});

describe("urlParse", () => {
  it("returns the parsed URL without logging", () => {
    const { logger, records } = captureLogger();

    expect(urlParse("http://example.com:8000/mount.mp3", logger)).toEqual({
      host: "example.com",
      port: 8000,
      mount: "/mount.mp3",
    });
    expect(records).toHaveLength(0);
  });

  it("logs the diagnostic and returns null", () => {
    const { logger, records } = captureLogger();

    expect(urlParse("http://example.com:99999/mount", logger)).toBeNull();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 50,
      msg: "invalid <url>: port: 99999 is too large",
      url: "http://example.com:99999/mount",
      reason: "PORT_INVALID",
    });
  });

  it("logs a missing port", () => {
    const { logger, records } = captureLogger();

    expect(urlParse("http://example.com/mount", logger)).toBeNull();
    expect(records[0]?.msg).toBe("invalid <url>: missing port");
  });
});
