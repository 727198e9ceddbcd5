/// <reference types="jest" />
import { CancelledError } from "../src/errors";
import { RelayError, relay } from "../src/relay";
import { ByteCollector, createDuplexPair } from "./utils";

function setup() {
  const [clientApp, clientSide] = createDuplexPair();
  const [upstreamSide, upstreamApp] = createDuplexPair();
  return {
    clientApp,
    clientSide,
    upstreamSide,
    upstreamApp,
    atClient: new ByteCollector(clientApp),
    atUpstream: new ByteCollector(upstreamApp),
  };
}

describe("relay", () => {
  it("should copy bytes both ways and count them", async () => {
    const { clientApp, clientSide, upstreamSide, upstreamApp, atClient, atUpstream } = setup();

    const relayed = relay(clientSide, upstreamSide);

    clientApp.write("ping");
    expect(String(await atUpstream.read(4))).toBe("ping");

    upstreamApp.write("pong!");
    expect(String(await atClient.read(5))).toBe("pong!");

    clientApp.end();
    await expect(relayed).resolves.toEqual({ uploaded: 4, downloaded: 5 });
    expect(clientSide.destroyed).toBe(true);
    expect(upstreamSide.destroyed).toBe(true);
  });

  it("should finish when the upstream reaches end of stream", async () => {
    const { clientSide, upstreamSide, upstreamApp, atClient } = setup();

    const relayed = relay(clientSide, upstreamSide);
    upstreamApp.end("bye");

    await expect(relayed).resolves.toEqual({ uploaded: 0, downloaded: 3 });
    expect(String(await atClient.rest())).toBe("bye");
  });

  it("should fail with the byte counts when a leg errors", async () => {
    const { clientApp, clientSide, upstreamSide, atUpstream } = setup();

    const relayed = relay(clientSide, upstreamSide);
    clientApp.write("abc");
    await atUpstream.read(3);

    upstreamSide.destroy(new Error("connection reset"));

    const err = await relayed.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RelayError);
    expect(err).toMatchObject({ message: "connection reset", uploaded: 3, downloaded: 0 });
    expect(clientSide.destroyed).toBe(true);
  });

  it("should fail when a leg closes without reaching end of stream", async () => {
    const { clientApp, clientSide, upstreamSide, atUpstream } = setup();

    const relayed = relay(clientSide, upstreamSide);
    clientApp.write("ab");
    await atUpstream.read(2);

    upstreamSide.destroy();

    const err = await relayed.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RelayError);
    expect(err).toMatchObject({
      message: "stream closed before end of stream",
      uploaded: 2,
      downloaded: 0,
    });
  });

  it("should fail at once when a leg is already gone", async () => {
    const { clientSide, upstreamSide } = setup();
    upstreamSide.on("error", () => undefined);
    upstreamSide.destroy(new Error("connection reset"));

    await expect(relay(clientSide, upstreamSide)).rejects.toMatchObject({
      name: "RelayError",
      message: "connection reset",
    });
    expect(clientSide.destroyed).toBe(true);
  });

  it("should tear down both legs when cancelled", async () => {
    const { clientSide, upstreamSide } = setup();
    const controller = new AbortController();

    const relayed = relay(clientSide, upstreamSide, controller.signal);
    controller.abort();

    await expect(relayed).rejects.toBeInstanceOf(CancelledError);
    expect(clientSide.destroyed).toBe(true);
    expect(upstreamSide.destroyed).toBe(true);
  });

  it("should not start when already cancelled", async () => {
    const { clientSide, upstreamSide } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(relay(clientSide, upstreamSide, controller.signal)).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(clientSide.destroyed).toBe(true);
  });
});
