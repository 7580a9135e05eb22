import { createServer, type Server } from "node:net";

import { afterEach, describe, expect, it } from "vitest";

import { getUidGid, isPortInUse } from "../src/platform.js";

describe("getUidGid", () => {
  const linux = { platform: "linux" as const, uid: 1000, gid: 100 };

  it("uses the current user's IDs on POSIX hosts", () => {
    expect(getUidGid(undefined, undefined, linux)).toEqual([1000, 100]);
  });

  it("prefers explicit IDs", () => {
    expect(getUidGid(1234, 55, linux)).toEqual([1234, 55]);
    expect(getUidGid(0, undefined, linux)).toEqual([0, 100]);
  });

  it("falls back to 999/0 on Windows", () => {
    expect(getUidGid(undefined, undefined, { platform: "win32" })).toEqual([999, 0]);
    expect(getUidGid(1234, undefined, { platform: "win32" })).toEqual([1234, 0]);
  });

  it("falls back to 999/0 when the host has no numeric IDs", () => {
    expect(getUidGid(undefined, undefined, { platform: "linux" })).toEqual([999, 0]);
  });
});

describe("isPortInUse", () => {
  let server: Server | undefined;

  afterEach(async () => {
    const open = server;
    server = undefined;
    if (open?.listening) {
      await new Promise<void>((resolve) => open.close(() => resolve()));
    }
  });

  async function listen(): Promise<number> {
    const srv = createServer();
    server = srv;
    await new Promise<void>((resolve) => srv.listen(0, "127.0.0.1", () => resolve()));
    const address = srv.address();
    if (address === null || typeof address === "string") {
      throw new Error("expected a TCP address");
    }
    return address.port;
  }

  it("reports a port with a listener as in use", async () => {
    const port = await listen();

    expect(await isPortInUse(port)).toBe(true);
  });

  it("reports a closed port as free", async () => {
    const port = await listen();
    const srv = server;
    server = undefined;
    await new Promise<void>((resolve) => srv?.close(() => resolve()));

    expect(await isPortInUse(port)).toBe(false);
  });
});
