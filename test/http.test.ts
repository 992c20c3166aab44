// test/http.test.ts
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Dispatcher, MockAgent } from "undici";
import { ConnectionFailure, TimeoutFailure } from "../src/errors.js";
import { doHttpRequest } from "../src/http.js";

/** Accepts every request and never answers; only an abort ends it. */
class HangingDispatcher extends Dispatcher {
  dispatch(_opts: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
    handler.onConnect?.((err?: Error) => handler.onError?.(err ?? new Error("aborted")));
    return true;
  }
}

describe("doHttpRequest", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("returns status, lower-cased headers and the raw body", async () => {
    agent
      .get("http://users.test")
      .intercept({ path: "/api/users/42", method: "GET" })
      .reply(200, "hello", { headers: { "X-Trace": "t1" } });

    const res = await doHttpRequest({ method: "GET", url: "http://users.test/api/users/42", headers: {} }, 500, {
      dispatcher: agent,
    });

    expect(res.status).toBe(200);
    expect(res.headers["x-trace"]).toBe("t1");
    expect(new TextDecoder().decode(res.body)).toBe("hello");
  });

  it("passes server errors through without classifying them", async () => {
    agent.get("http://users.test").intercept({ path: "/down", method: "GET" }).reply(503, "down");

    const res = await doHttpRequest({ method: "GET", url: "http://users.test/down", headers: {} }, 500, {
      dispatcher: agent,
    });

    expect(res.status).toBe(503);
  });

  it("sends method, headers and body", async () => {
    agent
      .get("http://users.test")
      .intercept({
        path: "/api/users",
        method: "POST",
        body: '{"name":"Ada"}',
        headers: { "content-type": "application/json" },
      })
      .reply(201, { id: "u1" });

    const res = await doHttpRequest(
      {
        method: "POST",
        url: "http://users.test/api/users",
        headers: { "content-type": "application/json" },
        body: '{"name":"Ada"}',
      },
      500,
      { dispatcher: agent }
    );

    expect(res.status).toBe(201);
    expect(JSON.parse(new TextDecoder().decode(res.body))).toEqual({ id: "u1" });
  });

  it("maps socket errors to ConnectionFailure", async () => {
    agent
      .get("http://users.test")
      .intercept({ path: "/reset", method: "GET" })
      .replyWithError(new Error("socket hang up"));

    const p = doHttpRequest({ method: "GET", url: "http://users.test/reset", headers: {} }, 500, {
      dispatcher: agent,
    });

    await expect(p).rejects.toBeInstanceOf(ConnectionFailure);
    await expect(p).rejects.toThrow(/socket hang up/);
  });

  it("maps unreachable hosts to ConnectionFailure", async () => {
    await expect(
      doHttpRequest({ method: "GET", url: "http://nowhere.test/", headers: {} }, 500, { dispatcher: agent })
    ).rejects.toBeInstanceOf(ConnectionFailure);
  });

  it("aborts after the timeout with TimeoutFailure", async () => {
    const p = doHttpRequest({ method: "GET", url: "http://slow.test/", headers: {} }, 20, {
      dispatcher: new HangingDispatcher(),
    });

    await expect(p).rejects.toBeInstanceOf(TimeoutFailure);
    await expect(p).rejects.toHaveProperty("timeoutMs", 20);
  });
});
