import { createServer, request as httpRequest, type Server } from "node:http";
import type { Express } from "express";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { AccountService } from "../account-service.ts";
import { createApp } from "../app.ts";
import { BeeClient } from "../bee-client.ts";
import { StampService } from "../stamp-service.ts";
import {
  BEE_URL,
  createCapturingLogger,
  hangingFetch,
  jsonResponse,
  type LogLine,
  requestedUrls,
  stubFetch,
} from "./helpers.ts";

describe("stamp API", () => {
  let mockFetch: ReturnType<typeof stubFetch>;
  let lines: LogLine[];
  let app: Express;

  beforeEach(() => {
    mockFetch = stubFetch();
    const { logger, lines: captured } = createCapturingLogger();
    lines = captured;
    const client = new BeeClient({ baseUrl: BEE_URL, timeoutMs: 20, logger });
    app = createApp({
      stampService: new StampService({
        client,
        logger,
        clock: () => new Date("2024-01-01T00:00:00Z"),
      }),
      accountService: new AccountService({ client, logger }),
      logger,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("answers liveness without calling the node", async () => {
    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
    expect(mockFetch).not.toHaveBeenCalled();
  });

  describe("GET /api/v1/stamps/:batchId", () => {
    test("returns the stamp with its derived expiration", async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({
          stamps: [{ batchID: "a1", batchTTL: 100, amount: "500" }],
        }),
      );

      const res = await request(app).get("/api/v1/stamps/a1");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        batchID: "a1",
        utilization: 0,
        usable: false,
        label: null,
        depth: 0,
        amount: "500",
        bucketDepth: 0,
        blockNumber: 0,
        immutableFlag: false,
        exists: false,
        batchTTL: 100,
        expiresAt: "2024-01-01T00:01:40Z",
        expectedExpiration: "2024-01-01-00-01",
      });
      expect(requestedUrls(mockFetch)).toEqual([`${BEE_URL}/batches`]);
    });

    test("answers 404 when no stamp matches", async () => {
      mockFetch.mockResolvedValue(jsonResponse([]));

      const res = await request(app).get("/api/v1/stamps/any-id");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ detail: "stamp not found for batch_id=any-id" });
    });

    test("answers 504 with no partial data when the node times out", async () => {
      mockFetch.mockImplementation(hangingFetch);

      const res = await request(app).get("/api/v1/stamps/a1");

      expect(res.status).toBe(504);
      expect(res.body).toEqual({
        detail: `upstream node did not respond within 20ms (${BEE_URL}/batches)`,
      });
    });

    test("answers 500 and logs a normalization error for a malformed body", async () => {
      mockFetch.mockResolvedValue(new Response("{not json", { status: 200 }));

      const res = await request(app).get("/api/v1/stamps/a1");

      expect(res.status).toBe(500);
      expect(Object.keys(res.body)).toEqual(["detail"]);
      expect(
        lines.find((line) => line.msg === "stamp pipeline failed"),
      ).toMatchObject({
        kind: "NormalizationError",
        stage: "fetching",
        batchId: "a1",
      });
    });

    test("answers 500 for an unrecognized envelope", async () => {
      mockFetch.mockResolvedValue(jsonResponse({ items: [] }));

      const res = await request(app).get("/api/v1/stamps/a1");

      expect(res.status).toBe(500);
    });

    test("answers 502 when the node rejects the request", async () => {
      mockFetch.mockResolvedValue(jsonResponse({ message: "down" }, 503));

      const res = await request(app).get("/api/v1/stamps/a1");

      expect(res.status).toBe(502);
      expect(res.body).toEqual({
        detail: `upstream node answered 503 for ${BEE_URL}/batches`,
      });
    });

    test("answers 502 when the node is unreachable", async () => {
      mockFetch.mockRejectedValue(new TypeError("fetch failed"));

      const res = await request(app).get("/api/v1/stamps/a1");

      expect(res.status).toBe(502);
      expect(res.body).toEqual({
        detail: `upstream node unreachable at ${BEE_URL}/batches`,
      });
    });
  });

  describe("GET /api/v1/stamps", () => {
    test("lists every stamp", async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ batches: [{ batchID: "b1" }, { batchID: "b2", batchTTL: 60 }] }),
      );

      const res = await request(app).get("/api/v1/stamps");

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(2);
      expect(res.body[1].expiresAt).toBe("2024-01-01T00:01:00Z");
    });
  });

  describe("node account endpoints", () => {
    test("returns the wallet", async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ walletAddress: "0xwallet", bzzBalance: "42" }),
      );

      const res = await request(app).get("/api/v1/wallet");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ walletAddress: "0xwallet", bzzBalance: "42" });
    });

    test("answers 500 for a wallet response without an address", async () => {
      mockFetch.mockResolvedValue(jsonResponse({ bzzBalance: "42" }));

      const res = await request(app).get("/api/v1/wallet");

      expect(res.status).toBe(500);
    });

    test("combines chequebook address and balance", async () => {
      mockFetch.mockImplementation(async (input) =>
        String(input).endsWith("/chequebook/address")
          ? jsonResponse({ chequebookAddress: "0xcheque" })
          : jsonResponse({ availableBalance: "10", totalBalance: "20" }),
      );

      const res = await request(app).get("/api/v1/chequebook/address");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        chequebookAddress: "0xcheque",
        availableBalance: "10",
        totalBalance: "20",
      });
    });
  });

  describe("client disconnect", () => {
    let server: Server;

    beforeEach(async () => {
      const { logger, lines: captured } = createCapturingLogger();
      lines = captured;
      // Long enough that only the disconnect can end the upstream call.
      const client = new BeeClient({ baseUrl: BEE_URL, timeoutMs: 5_000, logger });
      server = createServer(
        createApp({
          stampService: new StampService({ client, logger }),
          accountService: new AccountService({ client, logger }),
          logger,
        }),
      );
      await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    });

    afterEach(async () => {
      server.closeAllConnections();
      await new Promise((resolve) => server.close(resolve));
    });

    test("aborts the upstream call and writes nothing", async () => {
      mockFetch.mockImplementation(hangingFetch);
      const address = server.address();
      if (!address || typeof address === "string") {
        throw new Error("test server is not listening on a TCP port");
      }
      const clientErrors: Error[] = [];

      const req = httpRequest({
        host: "127.0.0.1",
        port: address.port,
        path: "/api/v1/stamps/a1",
      });
      req.on("error", (error) => clientErrors.push(error));
      req.end();

      await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(1));
      req.destroy();

      const upstreamSignal = mockFetch.mock.calls[0][1]?.signal;
      await vi.waitFor(() => expect(upstreamSignal?.aborted).toBe(true));
      await vi.waitFor(() =>
        expect(
          lines.find((line) => line.msg === "stamp pipeline failed"),
        ).toMatchObject({ kind: "UpstreamAborted", batchId: "a1" }),
      );
      expect(
        lines.find((line) => line.msg === "Bee request aborted by caller"),
      ).toMatchObject({ kind: "UpstreamAborted", url: `${BEE_URL}/batches` });
      expect(lines.map((line) => line.msg)).not.toContain("request completed");
    });
  });

  test("answers 404 for unknown routes", async () => {
    const res = await request(app).get("/api/v1/nope");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: "Not Found" });
  });
});
