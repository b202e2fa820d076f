import assert from "node:assert/strict";
import { IncomingMessage, Server, ServerResponse, createServer } from "node:http";
import { test } from "node:test";
import { createLogger } from "../../config/logger";

interface ReceivedPost {
  contentType: string | undefined;
  body: string;
}

async function startHook(
  status: number,
  onPost: (post: ReceivedPost) => void,
): Promise<{ server: Server; url: string }> {
  const server = createServer((request: IncomingMessage, response: ServerResponse) => {
    const chunks: Buffer[] = [];
    request.on("data", (chunk: Buffer) => chunks.push(chunk));
    request.on("end", () => {
      response.writeHead(status).end();
      onPost({
        contentType: request.headers["content-type"],
        body: Buffer.concat(chunks).toString("utf-8"),
      });
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (typeof address !== "object" || address === null) {
    throw new Error("Webhook server did not bind to a TCP port");
  }
  return { server, url: `http://127.0.0.1:${address.port}/hook` };
}

async function stopHook(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function webhookConfig(url: string) {
  return { enabled: true, url, minLevel: "warn" as const, ratePerMinute: 20, batchMs: 300 };
}

test("entries within one batch window arrive as a single redacted post", async () => {
  const posts: ReceivedPost[] = [];
  let firstPost: () => void = () => {};
  const received = new Promise<void>((resolve) => {
    firstPost = resolve;
  });
  const { server, url } = await startHook(204, (post) => {
    posts.push(post);
    firstPost();
  });

  try {
    const logger = createLogger({ write: () => {}, webhook: webhookConfig(url) });
    logger.info("below the webhook level");
    logger.warn("slow request", { token: "test-secret", route: "/api/evaluate" });
    logger.error("failed");

    await received;
    await new Promise((resolve) => setTimeout(resolve, 400));

    assert.equal(posts.length, 1);
    assert.equal(posts[0]?.contentType, "application/json");
    const payload: unknown = JSON.parse(posts[0]?.body ?? "");
    assert.ok(typeof payload === "object" && payload !== null);
    const text = Reflect.get(payload, "text");
    assert.equal(typeof text, "string");

    const blocks = String(text).split("\n\n---\n\n");
    assert.equal(blocks.length, 2);
    assert.match(
      blocks[0] ?? "",
      /^\[WARN\] \S+\nslow request\nmeta: \{"token":"\[REDACTED\]","route":"\/api\/evaluate"\}$/,
    );
    assert.match(blocks[1] ?? "", /^\[ERROR\] \S+\nfailed$/);
  } finally {
    await stopHook(server);
  }
});

test("a rejected delivery is reported on the error stream and dropped", async () => {
  const errorLines: string[] = [];
  let reported: () => void = () => {};
  const failureReported = new Promise<void>((resolve) => {
    reported = resolve;
  });
  const { server, url } = await startHook(500, () => {});

  try {
    const logger = createLogger({
      write: () => {},
      writeError: (line) => {
        errorLines.push(line);
        reported();
      },
      webhook: webhookConfig(url),
    });
    logger.error("evaluation crashed");

    await failureReported;

    assert.equal(errorLines.length, 1);
    assert.ok(errorLines[0]?.endsWith("\n"));
    const entry: unknown = JSON.parse(errorLines[0] ?? "");
    assert.ok(typeof entry === "object" && entry !== null);
    assert.equal(Reflect.get(entry, "level"), "warn");
    assert.equal(Reflect.get(entry, "message"), "Log webhook delivery failed");
    assert.deepEqual(Reflect.get(entry, "meta"), {
      error: "log_webhook_send_failed_http_500",
      dropped: 1,
    });
  } finally {
    await stopHook(server);
  }
});

test("a disabled or url-less webhook posts nothing", async () => {
  const posts: ReceivedPost[] = [];
  const { server, url } = await startHook(204, (post) => posts.push(post));

  try {
    createLogger({ write: () => {}, webhook: { ...webhookConfig(url), enabled: false } }).error("quiet");
    createLogger({ write: () => {}, webhook: { ...webhookConfig("  "), enabled: true } }).error("quiet");
    await new Promise((resolve) => setTimeout(resolve, 400));

    assert.deepEqual(posts, []);
  } finally {
    await stopHook(server);
  }
});
