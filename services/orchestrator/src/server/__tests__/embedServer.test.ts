import { describe, it, expect, afterEach } from "vitest";
import { EmbedServer } from "../embedServer";
import { HostingError } from "../../lib/errors";
import { makeClip, quietLogger } from "../../__tests__/fakes";

describe("EmbedServer", () => {
  const servers: EmbedServer[] = [];

  function createServer(preferredPort: number, portRange = 10): EmbedServer {
    const server = new EmbedServer({ host: "127.0.0.1", preferredPort, portRange, logger: quietLogger });
    servers.push(server);
    return server;
  }

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.stop()));
  });

  it("binds and reports the page URL", async () => {
    const server = createServer(0);

    const port = await server.start();

    expect(port).toBeGreaterThan(0);
    expect(server.port).toBe(port);
    expect(server.pageUrl).toBe(`http://localhost:${port}/`);
    expect(server.isListening).toBe(true);
  });

  it("returns the bound port when started twice", async () => {
    const server = createServer(0);
    const port = await server.start();

    await expect(server.start()).resolves.toBe(port);
  });

  it("falls back to the next port when the preferred one is taken", async () => {
    const taken = await createServer(0).start();
    const fallback = createServer(taken, 3);

    const port = await fallback.start();

    expect(port).toBeGreaterThan(taken);
    expect(port).toBeLessThanOrEqual(taken + 2);
  });

  it("fails with a hosting error when the range is exhausted", async () => {
    const taken = await createServer(0).start();

    await expect(createServer(taken, 1).start()).rejects.toBeInstanceOf(HostingError);
  });

  it("treats bind errors other than address-in-use as fatal", async () => {
    const server = new EmbedServer({ host: "203.0.113.1", preferredPort: 0, logger: quietLogger });

    await expect(server.start()).rejects.toBeInstanceOf(HostingError);
    expect(server.isListening).toBe(false);
  });

  it("binds again after stop", async () => {
    const server = createServer(0);
    await server.start();
    await server.stop();
    expect(server.isListening).toBe(false);

    await expect(server.start()).resolves.toBeGreaterThan(0);
  });

  it("tracks the hosted clip", () => {
    const server = createServer(0);
    const clip = makeClip();

    server.host(clip);
    expect(server.activeClip).toBe(clip);

    server.clear();
    expect(server.activeClip).toBeNull();
  });
});
