/**
 * Retry Service
 *
 * Periodic sweeps over hospital communications:
 * - resend failed or never-sent alerts with exponential backoff (2^n minutes)
 * - fail alerts the hospital never acknowledged
 */

import type { HavenStore } from "../shared/store/types";
import type { Communication } from "../shared/types";
import { errorMessage, HavenError } from "../shared/errors";
import { logger } from "../shared/logger";
import { addMinutes, generateId } from "../shared/utils";
import type { CommunicationService } from "./communication.service";
import { assertTransition } from "./communication.rules";

export interface RetryOptions {
  maxAttempts: number;
  retryWindowMinutes: number;
  ackTimeoutMinutes: number;
}

export interface RetrySummary {
  scanned: number;
  retried: number;
  succeeded: number;
  failed: number;
  /** Eligible but still inside their backoff delay */
  skipped: number;
}

export interface TimeoutSummary {
  checked: number;
  timedOut: string[];
}

/** Minutes to wait after attempt n before trying again */
export function backoffMinutes(attempts: number): number {
  return 2 ** attempts;
}

export function isDueForRetry(communication: Communication, now: Date): boolean {
  if (!communication.lastCommunicationAttempt) return true;
  const dueAt = addMinutes(
    communication.lastCommunicationAttempt,
    backoffMinutes(communication.communicationAttempts)
  );
  return now.getTime() >= dueAt.getTime();
}

export class RetryService {
  private readonly log = logger.child({ module: "retry" });

  constructor(
    private readonly store: HavenStore,
    private readonly communications: CommunicationService,
    private readonly options: RetryOptions
  ) {}

  /**
   * Resend recent failed/pending communications whose backoff has elapsed.
   * A communication at maxAttempts is never picked up again.
   */
  async retryFailed(now: Date = new Date()): Promise<RetrySummary> {
    const candidates = await this.store.communications.list({
      statuses: ["failed", "pending"],
      maxAttempts: this.options.maxAttempts,
      createdAfter: addMinutes(now, -this.options.retryWindowMinutes),
    });

    const summary: RetrySummary = {
      scanned: candidates.length,
      retried: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
    };

    for (const candidate of candidates) {
      if (!isDueForRetry(candidate, now)) {
        summary.skipped += 1;
        continue;
      }

      summary.retried += 1;
      try {
        const outcome = await this.communications.send(candidate.id, now);
        if (outcome.delivered) summary.succeeded += 1;
        else summary.failed += 1;
      } catch (error) {
        // Status moved on (or attempts ran out) since the scan
        if (!(error instanceof HavenError)) throw error;
        summary.failed += 1;
        this.log.warn(
          { communicationId: candidate.id, reason: errorMessage(error) },
          "Retry skipped"
        );
      }
    }

    if (summary.retried > 0) {
      this.log.info(summary, "Communication retry sweep finished");
    }
    return summary;
  }

  /**
   * Fail alerts sent more than ackTimeoutMinutes ago that the hospital has
   * not acknowledged
   */
  async checkTimeouts(now: Date = new Date()): Promise<TimeoutSummary> {
    const cutoff = addMinutes(now, -this.options.ackTimeoutMinutes);
    const sent = await this.store.communications.list({ statuses: ["sent"] });
    const overdue = sent.filter(
      (c) =>
        c.sentToHospitalAt !== null &&
        c.sentToHospitalAt.getTime() < cutoff.getTime() &&
        c.hospitalAcknowledgedAt === null
    );

    const timedOut: string[] = [];
    for (const communication of overdue) {
      const expired = await this.store.transaction(async (tx) => {
        const current = await tx.communications.getForUpdate(communication.id);
        if (!current || current.status !== "sent") return false;
        assertTransition(current.status, "failed");

        await tx.communications.save({
          ...current,
          status: "failed",
          failedAt: now,
          updatedAt: now,
        });
        await tx.communications.addLog({
          id: generateId(),
          communicationId: current.id,
          channel: "system",
          direction: "outgoing",
          messageType: "timeout",
          messageContent: `No hospital response after ${this.options.ackTimeoutMinutes} minutes`,
          messageData: {},
          isSuccessful: false,
          errorMessage: "Acknowledgement timeout",
          responseCode: null,
          sentAt: now,
          deliveredAt: null,
          responseReceivedAt: null,
        });
        return true;
      });
      if (expired) timedOut.push(communication.id);
    }

    if (timedOut.length > 0) {
      this.log.warn({ timedOut }, "Hospital communications timed out");
    }
    return { checked: sent.length, timedOut };
  }
}
