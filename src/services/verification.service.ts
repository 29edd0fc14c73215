/**
 * Verification Service
 *
 * Confirms an alert is genuine by sending the reporter a 6-digit code.
 */

import type { HavenStore } from "../shared/store/types";
import type { AlertVerification, EmergencyAlert, VerificationMethod } from "../shared/types";
import { ConflictError, NotFoundError, ValidationError } from "../shared/errors";
import { logger } from "../shared/logger";
import { addMinutes, generateId, generateVerificationCode } from "../shared/utils";
import type { AlertService } from "./alert.service";
import { isTerminalAlert } from "./alert.service";
import type { DeliveryResult, NotificationSender } from "./notification.service";

export interface VerificationOptions {
  codeTtlMinutes: number;
}

export interface InitiateResult {
  verification: AlertVerification;
  delivery: DeliveryResult;
}

export class VerificationService {
  private readonly log = logger.child({ module: "verification" });

  constructor(
    private readonly store: HavenStore,
    private readonly alerts: AlertService,
    private readonly sender: NotificationSender,
    private readonly options: VerificationOptions = { codeTtlMinutes: 10 }
  ) {}

  /**
   * Create a code for the alert and send it to the reporter's phone
   */
  async initiate(
    alertId: string,
    method: Exclude<VerificationMethod, "auto" | "auto_priority"> = "sms"
  ): Promise<InitiateResult> {
    const alert = await this.alerts.get(alertId);
    if (isTerminalAlert(alert)) {
      throw new ConflictError(`Alert ${alert.reference} is already ${alert.status}`);
    }
    if (alert.isVerified) {
      throw new ConflictError(`Alert ${alert.reference} is already verified`);
    }
    if (!alert.reporterPhone) {
      throw new ValidationError("Alert has no reporter phone number to verify");
    }

    const now = new Date();
    const verification: AlertVerification = {
      id: generateId(),
      alertId,
      method,
      code: generateVerificationCode(),
      isSuccessful: false,
      responseReceived: false,
      createdAt: now,
      respondedAt: null,
    };

    await this.store.transaction(async (tx) => {
      const current = await tx.alerts.getForUpdate(alertId);
      if (!current) throw new NotFoundError("Emergency alert", alertId);
      await tx.alerts.saveVerification(verification);
      await tx.alerts.save({
        ...current,
        verificationAttempts: current.verificationAttempts + 1,
        updatedAt: now,
      });
    });

    const delivery = await this.sender.send({
      channel: method === "call" ? "voice" : "sms",
      recipient: alert.reporterPhone,
      message: `Haven verification code for ${alert.reference}: ${verification.code}`,
    });
    if (!delivery.success) {
      this.log.warn({ alertId, reason: delivery.error }, "Verification code not delivered");
    }

    return { verification, delivery };
  }

  /**
   * Check a code against the newest pending verification. A match verifies
   * the alert; a mismatch is recorded and returns false.
   */
  async verifyCode(alertId: string, code: string): Promise<boolean> {
    await this.alerts.get(alertId);
    const now = new Date();
    const cutoff = addMinutes(now, -this.options.codeTtlMinutes);

    const pending = (await this.store.alerts.listVerifications(alertId))
      .filter((v) => !v.isSuccessful && v.createdAt.getTime() >= cutoff.getTime())
      .pop();
    if (!pending) {
      throw new ValidationError("No pending verification code for this alert");
    }

    if (pending.code !== code) {
      await this.store.alerts.saveVerification({
        ...pending,
        responseReceived: true,
        respondedAt: now,
      });
      this.log.info({ alertId }, "Verification code rejected");
      return false;
    }

    await this.alerts.recordVerification(
      { ...pending, isSuccessful: true, responseReceived: true, respondedAt: now },
      "sms_code"
    );
    return true;
  }

  /**
   * Verification without reporter interaction, used by the orchestrator.
   * Critical and high priority alerts are recorded as `auto_priority`.
   */
  async autoVerify(alert: EmergencyAlert): Promise<EmergencyAlert> {
    if (alert.isVerified) return alert;
    const method: VerificationMethod =
      alert.priority === "critical" || alert.priority === "high" ? "auto_priority" : "auto";

    const now = new Date();
    return this.alerts.recordVerification(
      {
        id: generateId(),
        alertId: alert.id,
        method,
        code: null,
        isSuccessful: true,
        responseReceived: true,
        createdAt: now,
        respondedAt: now,
      },
      method
    );
  }
}
