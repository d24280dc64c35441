import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import WebSocket from "ws";
import { makeConfig } from "../../src/config/index.ts";
import { startServer, type ServerHandle } from "../../src/server.ts";
import { waitFor } from "../helpers/memoryConnection.ts";

interface Client {
  readonly socket: WebSocket;
  readonly messages: string[];
  readonly closed: Promise<{ code: number; reason: string }>;
}

async function serve(
  t: TestContext,
  render: "html" | "text",
  heartbeat = { intervalMs: 15_000, timeoutMs: 5_000 }
): Promise<{ root: string; handle: ServerHandle }> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "tailcast-server-"));
  const handle = await startServer(
    makeConfig({
      server: { host: "127.0.0.1", port: 0 },
      tail: { roots: [root], pollMs: 20, render },
      heartbeat,
      log: { level: "none" },
    })
  );
  t.after(async () => {
    await handle.close();
    await fs.rm(root, { recursive: true, force: true });
  });
  return { root, handle };
}

function connect(handle: ServerHandle, target: string): Client {
  const socket = new WebSocket(`ws://127.0.0.1:${handle.address.port}${target}`);
  const messages: string[] = [];
  socket.on("message", (data) => {
    messages.push(data.toString());
  });
  const closed = new Promise<{ code: number; reason: string }>((resolve) => {
    socket.on("close", (code, reason) => {
      resolve({ code, reason: reason.toString() });
    });
  });
  return { socket, messages, closed };
}

test("follows a file over a real WebSocket and closes with 1001 on shutdown", async (t) => {
  const { root, handle } = await serve(t, "text");
  const file = path.join(root, "demo.log");
  await fs.writeFile(file, "a\nb\n");

  const client = connect(handle, "/demo.log?tail=1");
  await waitFor(() => client.messages.length === 1);
  assert.equal(client.messages[0], "a\nb\n");
  assert.equal(handle.sessions(), 1);

  await fs.appendFile(file, "c\n");
  await waitFor(() => client.messages.length === 2);
  assert.equal(client.messages[1], "c\n");

  const health = await fetch(`${handle.url}/healthz`);
  assert.equal(health.status, 200);
  assert.deepEqual(await health.json(), { ok: true, sessions: 1, openFiles: 1 });

  await handle.close();
  assert.deepEqual(await client.closed, { code: 1001, reason: "server shutting down" });
  assert.equal(handle.sessions(), 0);
});

test("serves read-once requests sent as the first message", async (t) => {
  const { root, handle } = await serve(t, "text");
  await fs.writeFile(path.join(root, "demo.log"), "only\n");

  const client = connect(handle, "/");
  await new Promise<void>((resolve) => client.socket.once("open", () => resolve()));
  client.socket.send("demo.log");

  assert.deepEqual(await client.closed, { code: 1000, reason: "done" });
  assert.deepEqual(client.messages, ["only\n"]);
});

test("a client that answers pings keeps its session open", async (t) => {
  const { root, handle } = await serve(t, "text", { intervalMs: 50, timeoutMs: 50 });
  await fs.writeFile(path.join(root, "demo.log"), "a\n");

  const client = connect(handle, "/demo.log?tail=1");
  client.socket.on("message", (data) => {
    if (data.toString() === "ping") client.socket.send("pong");
  });

  await waitFor(() => client.messages.filter((message) => message === "ping").length >= 3);
  assert.equal(client.messages[0], "a\n");
  assert.deepEqual(new Set(client.messages.slice(1)), new Set(["ping"]));
  assert.equal(handle.sessions(), 1);
});

test("a request outside the root gets Forbidden and a policy close", async (t) => {
  const { handle } = await serve(t, "html");

  const client = connect(handle, "/..%2F..%2Fetc%2Fpasswd");
  assert.deepEqual(await client.closed, { code: 1008, reason: "Forbidden" });
  assert.deepEqual(client.messages, ['<font color="red"><strong>Forbidden</strong></font>']);
});

test("the viewer page is served over HTTP", async (t) => {
  const { handle } = await serve(t, "html");
  const page = await fetch(`${handle.url}/`);
  assert.equal(page.status, 200);
  assert.match(await page.text(), /<title>tailcast<\/title>/);
});
