import nock from "nock";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import { TransportError } from "../suite/errors.js";
import { createFixture, toPayload } from "../suite/fixture.js";
import type { HttpExchange } from "../suite/types.js";
import { BookingClient, maskToken, sessionCookie } from "./booking-client.js";

const BASE = "http://booking.test";

describe("BookingClient", () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  const client = new BookingClient({ baseUrl: BASE, timeoutMs: 1000 });

  it("resolves with the exchange for non-2xx statuses", async () => {
    nock(BASE).get("/booking/9").reply(404, "Not Found");

    const exchange = await client.getBooking(9);

    expect(exchange).toMatchObject({
      method: "GET",
      url: "http://booking.test/booking/9",
      status: 404,
      responseBody: "Not Found",
    });
    expect(exchange.requestBody).toBeUndefined();
  });

  it("parses JSON bodies", async () => {
    nock(BASE).post("/auth", { username: "admin", password: "test-secret" }).reply(200, {
      token: "abc123token",
    });

    const exchange = await client.authenticate({ username: "admin", password: "test-secret" });

    expect(exchange.status).toBe(200);
    expect(exchange.responseBody).toEqual({ token: "abc123token" });
    expect(exchange.requestBody).toEqual({ username: "admin", password: "test-secret" });
  });

  it("sends the session token as a cookie and masks it in the snapshot", async () => {
    const booking = toPayload(createFixture());
    const scope = nock(BASE)
      .put("/booking/5")
      .matchHeader("cookie", "token=abc123token")
      .reply(200, { ...booking });

    const exchange = await client.updateBooking(5, booking, "abc123token");

    expect(scope.isDone()).toBe(true);
    expect(exchange.headers).toEqual({ Cookie: "token=abc12..." });
  });

  it("sends no cookie when creating a booking", async () => {
    const scope = nock(BASE, { badheaders: ["cookie"] })
      .post("/booking")
      .reply(200, { bookingid: 1 });

    const exchange = await client.createBooking(toPayload(createFixture()));

    expect(scope.isDone()).toBe(true);
    expect(exchange.headers).toBeUndefined();
  });

  it("raises TransportError when the connection fails", async () => {
    nock(BASE).delete("/booking/4").replyWithError("connect ECONNREFUSED");

    await expect(client.deleteBooking(4, "abc123token")).rejects.toBeInstanceOf(TransportError);
  });

  it("raises TransportError on timeout", async () => {
    const slow = new BookingClient({ baseUrl: BASE, timeoutMs: 50 });
    nock(BASE).get("/").delay(500).reply(200, "OK");

    await expect(slow.ping()).rejects.toThrow(/timeout/i);
  });

  it("reports every exchange to a scoped recorder, including failed ones", async () => {
    nock(BASE)
      .get("/")
      .reply(200, "OK")
      .get("/booking/1")
      .replyWithError("socket hang up");

    const seen: HttpExchange[] = [];
    const scoped = client.scoped((exchange) => seen.push(exchange));

    await scoped.ping();
    await expect(scoped.getBooking(1)).rejects.toThrow(
      "GET http://booking.test/booking/1 failed: socket hang up",
    );

    expect(seen.map((e) => [e.url, e.status])).toEqual([
      ["http://booking.test/", 200],
      ["http://booking.test/booking/1", undefined],
    ]);
    expect(scoped.baseUrl).toBe(BASE);
  });
});

describe("sessionCookie", () => {
  it("builds a cookie header, not an authorization header", () => {
    expect(sessionCookie("t0k")).toEqual({ Cookie: "token=t0k" });
  });
});

describe("maskToken", () => {
  it("keeps the first five characters", () => {
    expect(maskToken("abcdef123")).toBe("abcde...");
  });

  it("hides short tokens entirely", () => {
    expect(maskToken("abc")).toBe("***");
  });
});
