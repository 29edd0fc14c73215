import { beforeEach, describe, expect, it, vi } from "vitest";
import { backoffMinutes, isDueForRetry } from "../src/services/retry.service";
import { PermanentFailure } from "../src/shared/errors";
import { loadConfig } from "../src/shared/config";
import { addMinutes } from "../src/shared/utils";
import {
  createTestContext,
  makeHospital,
  openCommunication,
  staffOf,
  type TestContext,
} from "./helpers";

// Hospital reachable only through its API
const API_ONLY = makeHospital({
  id: "api-only",
  apiBaseUrl: "https://api-only.example.test",
  phone: "",
  emergencyPhone: null,
  smsNotifications: false,
  webhookUrl: null,
});

const wideWindow = loadConfig({
  NODE_ENV: "test",
  LOG_LEVEL: "silent",
  LOG_PRETTY: "false",
  DISCOVERY_CACHE_TTL_SECONDS: "0",
  RETRY_WINDOW_MINUTES: "60",
});

function attemptedAt(value: Date | null): Date {
  if (!value) throw new Error("communication was never attempted");
  return value;
}

describe("backoff", () => {
  it("doubles the wait with every attempt", () => {
    expect([0, 1, 2, 3].map(backoffMinutes)).toEqual([1, 2, 4, 8]);
  });

  it("is due once the backoff since the last attempt has passed", async () => {
    const ctx = await createTestContext([API_ONLY]);
    ctx.sender.failChannel("api");
    const { communication } = await openCommunication(ctx.services, "api-only");
    const last = attemptedAt(communication.lastCommunicationAttempt);

    expect(isDueForRetry(communication, addMinutes(last, 1.99))).toBe(false);
    expect(isDueForRetry(communication, addMinutes(last, 2))).toBe(true);
    expect(isDueForRetry({ ...communication, lastCommunicationAttempt: null }, last)).toBe(true);
  });
});

describe("RetryService.retryFailed", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext([API_ONLY]);
    ctx.sender.failChannel("api");
  });

  it("fails a hospital whose only channel is down and picks it up on the next scan", async () => {
    const outcome = await openCommunication(ctx.services, "api-only");

    expect(outcome.communication.status).toBe("failed");
    expect(outcome.communication.communicationAttempts).toBe(1);
    const logs = await ctx.store.communications.listLogs(outcome.communication.id);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      channel: "api",
      isSuccessful: false,
      errorMessage: "api delivery failed: HTTP 503",
    });

    const first = attemptedAt(outcome.communication.lastCommunicationAttempt);
    const summary = await ctx.services.retry.retryFailed(addMinutes(first, 2));
    expect(summary).toEqual({ scanned: 1, retried: 1, succeeded: 0, failed: 1, skipped: 0 });

    const stored = await ctx.store.communications.get(outcome.communication.id);
    expect(stored?.communicationAttempts).toBe(2);
  });

  it("skips communications still inside their backoff", async () => {
    const { communication } = await openCommunication(ctx.services, "api-only");
    const first = attemptedAt(communication.lastCommunicationAttempt);

    const summary = await ctx.services.retry.retryFailed(addMinutes(first, 1));
    expect(summary).toEqual({ scanned: 1, retried: 0, succeeded: 0, failed: 0, skipped: 1 });
  });

  it("marks the communication sent once the hospital answers", async () => {
    const { communication } = await openCommunication(ctx.services, "api-only");
    const first = attemptedAt(communication.lastCommunicationAttempt);

    ctx.sender.succeedChannel("api");
    const summary = await ctx.services.retry.retryFailed(addMinutes(first, 2));
    expect(summary.succeeded).toBe(1);

    const stored = await ctx.store.communications.get(communication.id);
    expect(stored?.status).toBe("sent");
    expect(stored?.failedAt).toBeNull();
    expect(stored?.communicationAttempts).toBe(2);
  });

  it("leaves communications older than the retry window alone", async () => {
    const { communication } = await openCommunication(ctx.services, "api-only");
    const first = attemptedAt(communication.lastCommunicationAttempt);

    const summary = await ctx.services.retry.retryFailed(addMinutes(first, 6));
    expect(summary.scanned).toBe(0);
  });

  it("never makes a fourth attempt", async () => {
    const wide = await createTestContext([API_ONLY], { config: wideWindow });
    wide.sender.failChannel("api");
    const { communication } = await openCommunication(wide.services, "api-only");
    const first = attemptedAt(communication.lastCommunicationAttempt);

    await wide.services.retry.retryFailed(addMinutes(first, 2));
    await wide.services.retry.retryFailed(addMinutes(first, 6));
    const third = await wide.store.communications.get(communication.id);
    expect(third?.communicationAttempts).toBe(3);
    expect(third?.status).toBe("failed");

    const later = await wide.services.retry.retryFailed(addMinutes(first, 30));
    expect(later.scanned).toBe(0);
    expect(wide.sender.sentOn("api")).toHaveLength(3);

    await expect(wide.services.communications.send(communication.id)).rejects.toThrow(
      PermanentFailure
    );
  });

  it("counts only one of two sends racing for the last attempt", async () => {
    const { communication } = await openCommunication(ctx.services, "api-only");
    const stored = await ctx.store.communications.get(communication.id);
    if (!stored) throw new Error("communication missing");
    await ctx.store.communications.save({ ...stored, communicationAttempts: 2 });

    const release = ctx.sender.hold();
    const racing = Promise.allSettled([
      ctx.services.communications.send(communication.id),
      ctx.services.communications.send(communication.id),
    ]);
    // both sends passed their pre-check and are waiting on the hospital
    await vi.waitFor(() => expect(ctx.sender.sentOn("api")).toHaveLength(3));
    release();
    const results = await racing;

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "fulfilled"]);
    const after = await ctx.store.communications.get(communication.id);
    expect(after?.communicationAttempts).toBe(3);
    expect(after?.status).toBe("failed");
    const logs = await ctx.store.communications.listLogs(communication.id);
    expect(logs).toHaveLength(3);
  });
});

describe("RetryService.checkTimeouts", () => {
  const hospital = makeHospital({ id: "slow", apiBaseUrl: "https://slow.example.test" });

  it("fails sent alerts the hospital never acknowledged", async () => {
    const ctx = await createTestContext([hospital], { config: wideWindow });
    const { communication } = await openCommunication(ctx.services, "slow");
    const sentAt = attemptedAt(communication.sentToHospitalAt);

    const early = await ctx.services.retry.checkTimeouts(addMinutes(sentAt, 5));
    expect(early).toEqual({ checked: 1, timedOut: [] });

    const late = await ctx.services.retry.checkTimeouts(addMinutes(sentAt, 11));
    expect(late).toEqual({ checked: 1, timedOut: [communication.id] });

    const stored = await ctx.store.communications.get(communication.id);
    expect(stored?.status).toBe("failed");
    const logs = await ctx.store.communications.listLogs(communication.id);
    expect(logs.at(-1)).toMatchObject({
      channel: "system",
      messageType: "timeout",
      isSuccessful: false,
      errorMessage: "Acknowledgement timeout",
    });

    // a timed-out alert goes back through the retry scan
    const retry = await ctx.services.retry.retryFailed(addMinutes(sentAt, 12));
    expect(retry.succeeded).toBe(1);
  });

  it("ignores acknowledged communications", async () => {
    const ctx = await createTestContext([hospital]);
    const { communication } = await openCommunication(ctx.services, "slow");
    await ctx.services.communications.acknowledge(communication.id, staffOf("slow"));
    const sentAt = attemptedAt(communication.sentToHospitalAt);

    const result = await ctx.services.retry.checkTimeouts(addMinutes(sentAt, 30));
    expect(result).toEqual({ checked: 0, timedOut: [] });
  });
});
