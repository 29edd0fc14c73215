import { beforeEach, describe, expect, it } from "vitest";
import { AlertService } from "../src/services/alert.service";
import type { Geocoder } from "../src/services/geocoding.service";
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from "../src/shared/errors";
import { Database } from "../src/shared/store/Database";
import { addMinutes, generateId } from "../src/shared/utils";
import {
  NAIROBI_CBD,
  admin,
  createTestContext,
  firstAider,
  makeHospital,
  openCommunication,
  otherFirstAider,
  raiseAlert,
  staffOf,
  type TestContext,
} from "./helpers";

function otherCode(code: string | null): string {
  return code === "111111" ? "222222" : "111111";
}

describe("AlertService", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext([makeHospital({ id: "city" })]);
  });

  describe("createAlert", () => {
    it("opens a pending alert with a reference and a creation update", async () => {
      const { alert, duplicate } = await ctx.services.alerts.createAlert(firstAider, {
        emergencyType: "cardiac",
        location: NAIROBI_CBD,
        address: "Kenyatta Avenue",
      });

      expect(duplicate).toBe(false);
      expect(alert.reference).toMatch(/^EMG\d{12}[A-Z0-9]{6}$/);
      expect(alert).toMatchObject({
        reporterId: "fa-1",
        status: "pending",
        priority: "medium",
        isActive: true,
        isVerified: false,
        address: "Kenyatta Avenue",
        description: "",
        reporterPhone: null,
      });

      const updates = await ctx.services.alerts.updates(alert.id);
      expect(updates).toHaveLength(1);
      expect(updates[0]).toMatchObject({ updateType: "created", newStatus: "pending", actorId: "fa-1" });
    });

    it("returns the open alert for a repeat report from the same first aider", async () => {
      const first = await raiseAlert(ctx.services);
      const repeat = await ctx.services.alerts.createAlert(firstAider, {
        emergencyType: "trauma",
        location: NAIROBI_CBD,
      });

      expect(repeat.duplicate).toBe(true);
      expect(repeat.alert.id).toBe(first.id);

      const other = await ctx.services.alerts.createAlert(otherFirstAider, {
        emergencyType: "trauma",
        location: NAIROBI_CBD,
      });
      expect(other.duplicate).toBe(false);
    });

    it("accepts a new report once the earlier one is closed", async () => {
      const first = await raiseAlert(ctx.services);
      await ctx.services.alerts.cancel(first.id, firstAider, "Wrong location");

      const next = await ctx.services.alerts.createAlert(firstAider, {
        emergencyType: "trauma",
        location: NAIROBI_CBD,
      });
      expect(next.duplicate).toBe(false);
      expect(next.alert.id).not.toBe(first.id);
    });

    it("is only open to first aiders and validates input", async () => {
      await expect(
        ctx.services.alerts.createAlert(staffOf("city"), {
          emergencyType: "trauma",
          location: NAIROBI_CBD,
        })
      ).rejects.toThrow(ForbiddenError);
      await expect(
        ctx.services.alerts.createAlert(firstAider, {
          emergencyType: "trauma",
          location: { lat: 120, lng: 0 },
        })
      ).rejects.toThrow(ValidationError);
    });

    it("fills the address from the geocoder and carries on when it fails", async () => {
      const store = new Database();
      const working: Geocoder = {
        async geocode() {
          return null;
        },
        async reverseGeocode() {
          return "Moi Avenue, Nairobi";
        },
      };
      const broken: Geocoder = {
        async geocode() {
          return null;
        },
        async reverseGeocode() {
          throw new Error("REQUEST_DENIED");
        },
      };

      const { alert } = await new AlertService(store, working).createAlert(firstAider, {
        emergencyType: "medical",
        location: NAIROBI_CBD,
      });
      expect(alert.address).toBe("Moi Avenue, Nairobi");

      const fallback = await new AlertService(store, broken).createAlert(otherFirstAider, {
        emergencyType: "medical",
        location: NAIROBI_CBD,
      });
      expect(fallback.alert.address).toBeNull();
    });
  });

  describe("updateStatus", () => {
    it("stamps the status timestamps", async () => {
      const alert = await raiseAlert(ctx.services);

      const verified = await ctx.services.alerts.updateStatus(alert.id, "verified");
      expect(verified.isVerified).toBe(true);
      expect(verified.verifiedAt).toBeInstanceOf(Date);

      const dispatched = await ctx.services.alerts.updateStatus(alert.id, "dispatched", "admin-1");
      expect(dispatched.dispatchedAt).toBeInstanceOf(Date);

      const completed = await ctx.services.alerts.updateStatus(alert.id, "completed");
      expect(completed.isActive).toBe(false);
      expect(completed.completedAt).toBeInstanceOf(Date);

      const updates = await ctx.services.alerts.updates(alert.id);
      expect(updates.map((u) => [u.previousStatus, u.newStatus])).toEqual([
        [null, "pending"],
        ["pending", "verified"],
        ["verified", "dispatched"],
        ["dispatched", "completed"],
      ]);
    });

    it("only moves an alert forward", async () => {
      const alert = await raiseAlert(ctx.services);
      await ctx.services.alerts.updateStatus(alert.id, "verified");
      await ctx.services.alerts.updateStatus(alert.id, "hospital_selected");

      await expect(ctx.services.alerts.updateStatus(alert.id, "pending")).rejects.toThrow(
        `Cannot move alert ${alert.reference} from hospital_selected to pending`
      );
      await expect(ctx.services.alerts.updateStatus(alert.id, "verified")).rejects.toThrow(
        ConflictError
      );

      const stored = await ctx.services.alerts.get(alert.id);
      expect(stored.status).toBe("hospital_selected");
      const updates = await ctx.services.alerts.updates(alert.id);
      expect(updates).toHaveLength(3);
    });

    it("refuses every change to a closed alert", async () => {
      const alert = await raiseAlert(ctx.services);
      await ctx.services.alerts.updateStatus(alert.id, "expired");

      await expect(ctx.services.alerts.updateStatus(alert.id, "verified")).rejects.toThrow(
        `Alert ${alert.reference} is already expired`
      );
      await expect(
        ctx.services.alerts.updateLocation(alert.id, firstAider, { lat: -1.29, lng: 36.82 })
      ).rejects.toThrow(ConflictError);
    });
  });

  describe("reporter actions", () => {
    it("moves the alert for its reporter only", async () => {
      const alert = await raiseAlert(ctx.services);

      const moved = await ctx.services.alerts.updateLocation(alert.id, firstAider, {
        lat: -1.29,
        lng: 36.82,
      });
      expect(moved.location).toEqual({ lat: -1.29, lng: 36.82 });

      await expect(
        ctx.services.alerts.updateLocation(alert.id, otherFirstAider, { lat: -1.29, lng: 36.82 })
      ).rejects.toThrow("Only the reporting first aider can change this alert");
      await expect(
        ctx.services.alerts.updateLocation(alert.id, firstAider, { lat: -1.29 })
      ).rejects.toThrow(ValidationError);

      const updates = await ctx.services.alerts.updates(alert.id);
      expect(updates.at(-1)).toMatchObject({
        updateType: "location_update",
        details: { from: NAIROBI_CBD, to: { lat: -1.29, lng: 36.82 } },
      });
    });

    it("cancels for its reporter only", async () => {
      const alert = await raiseAlert(ctx.services);

      await expect(ctx.services.alerts.cancel(alert.id, otherFirstAider)).rejects.toThrow(
        ForbiddenError
      );

      const cancelled = await ctx.services.alerts.cancel(alert.id, firstAider, "Patient left");
      expect(cancelled.status).toBe("cancelled");
      expect(cancelled.isActive).toBe(false);
      expect(cancelled.cancelledAt).toBeInstanceOf(Date);

      const updates = await ctx.services.alerts.updates(alert.id);
      expect(updates.at(-1)?.details).toEqual({ reason: "Patient left" });
    });
  });

  describe("listing", () => {
    it("shows first aiders their own active alerts and admins all of them", async () => {
      const mine = await raiseAlert(ctx.services);
      const theirs = await raiseAlert(ctx.services, otherFirstAider);

      expect((await ctx.services.alerts.listActive(firstAider)).map((a) => a.id)).toEqual([
        mine.id,
      ]);
      expect((await ctx.services.alerts.listActive(admin)).map((a) => a.id)).toEqual([
        theirs.id,
        mine.id,
      ]);

      await ctx.services.alerts.cancel(mine.id, firstAider);
      expect(await ctx.services.alerts.listActive(firstAider)).toEqual([]);
      expect((await ctx.services.alerts.history("fa-1")).map((a) => a.id)).toEqual([mine.id]);
    });
  });

  describe("delete", () => {
    it("removes the alert with its updates and communications", async () => {
      const { communication } = await openCommunication(ctx.services, "city");
      const alertId = communication.alertId;

      await expect(ctx.services.alerts.delete(alertId, otherFirstAider)).rejects.toThrow(
        "Only the reporter or an administrator can delete an alert"
      );

      await ctx.services.alerts.delete(alertId, admin);

      await expect(ctx.services.alerts.get(alertId)).rejects.toThrow(NotFoundError);
      expect(await ctx.store.alerts.listUpdates(alertId)).toEqual([]);
      expect(await ctx.store.communications.get(communication.id)).toBeNull();
      expect(await ctx.store.communications.listLogs(communication.id)).toEqual([]);
    });
  });
});

describe("VerificationService", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  it("sends a code to the reporter and verifies the alert on a match", async () => {
    const alert = await raiseAlert(ctx.services);

    const { verification, delivery } = await ctx.services.verification.initiate(alert.id);
    expect(delivery.success).toBe(true);
    expect(verification.code).toMatch(/^\d{6}$/);

    const [sms] = ctx.sender.sentOn("sms");
    expect(sms?.recipient).toBe("+254711000000");
    expect(sms?.message).toBe(
      `Haven verification code for ${alert.reference}: ${verification.code}`
    );
    expect((await ctx.services.alerts.get(alert.id)).verificationAttempts).toBe(1);

    expect(
      await ctx.services.verification.verifyCode(alert.id, otherCode(verification.code))
    ).toBe(false);
    expect((await ctx.services.alerts.get(alert.id)).isVerified).toBe(false);

    expect(await ctx.services.verification.verifyCode(alert.id, verification.code ?? "")).toBe(
      true
    );
    const verified = await ctx.services.alerts.get(alert.id);
    expect(verified.status).toBe("verified");
    expect(verified.verificationMethod).toBe("sms_code");

    await expect(
      ctx.services.verification.verifyCode(alert.id, verification.code ?? "")
    ).rejects.toThrow("No pending verification code for this alert");
    await expect(ctx.services.verification.initiate(alert.id)).rejects.toThrow(
      `Alert ${alert.reference} is already verified`
    );
  });

  it("places a voice call when asked", async () => {
    const alert = await raiseAlert(ctx.services);
    await ctx.services.verification.initiate(alert.id, "call");
    expect(ctx.sender.sentOn("voice")).toHaveLength(1);
  });

  it("needs a phone number to verify", async () => {
    const alert = await raiseAlert(ctx.services, firstAider, { reporterPhone: undefined });
    await expect(ctx.services.verification.initiate(alert.id)).rejects.toThrow(
      "Alert has no reporter phone number to verify"
    );
  });

  it("ignores codes older than their lifetime", async () => {
    const alert = await raiseAlert(ctx.services);
    await ctx.store.alerts.saveVerification({
      id: generateId(),
      alertId: alert.id,
      method: "sms",
      code: "123456",
      isSuccessful: false,
      responseReceived: false,
      createdAt: addMinutes(new Date(), -11),
      respondedAt: null,
    });

    await expect(ctx.services.verification.verifyCode(alert.id, "123456")).rejects.toThrow(
      ValidationError
    );
  });

  it("refuses closed alerts", async () => {
    const alert = await raiseAlert(ctx.services);
    await ctx.services.alerts.cancel(alert.id, firstAider);
    await expect(ctx.services.verification.initiate(alert.id)).rejects.toThrow(ConflictError);
  });

  it("records priority auto verification under its own method", async () => {
    const alert = await raiseAlert(ctx.services, firstAider, { priority: "critical" });

    const verified = await ctx.services.verification.autoVerify(alert);

    expect(verified.status).toBe("verified");
    expect(verified.verificationMethod).toBe("auto_priority");
    const [record] = await ctx.store.alerts.listVerifications(alert.id);
    expect(record).toMatchObject({ method: "auto_priority", code: null, isSuccessful: true });
    const updates = await ctx.services.alerts.updates(alert.id);
    expect(updates.at(-1)).toMatchObject({
      updateType: "status_change",
      previousStatus: "pending",
      newStatus: "verified",
      details: { method: "auto_priority" },
    });
  });

  it("verifies an alert past pending without moving its status", async () => {
    const alert = await raiseAlert(ctx.services);
    const { verification } = await ctx.services.verification.initiate(alert.id);
    await ctx.services.alerts.updateStatus(alert.id, "dispatched", "admin-1");

    expect(await ctx.services.verification.verifyCode(alert.id, verification.code ?? "")).toBe(
      true
    );

    const stored = await ctx.services.alerts.get(alert.id);
    expect(stored.status).toBe("dispatched");
    expect(stored.isVerified).toBe(true);
    expect(stored.verificationMethod).toBe("sms_code");
    const updates = await ctx.services.alerts.updates(alert.id);
    expect(updates.at(-1)).toMatchObject({
      updateType: "verification",
      newStatus: null,
      details: { method: "sms_code", status: "dispatched" },
    });
  });

  it("keeps the code pending when the alert closed before it was entered", async () => {
    const alert = await raiseAlert(ctx.services);
    const { verification } = await ctx.services.verification.initiate(alert.id);
    await ctx.services.alerts.cancel(alert.id, firstAider);

    await expect(
      ctx.services.verification.verifyCode(alert.id, verification.code ?? "")
    ).rejects.toThrow(`Alert ${alert.reference} is already cancelled`);

    const [record] = await ctx.store.alerts.listVerifications(alert.id);
    expect(record?.isSuccessful).toBe(false);
    expect(record?.respondedAt).toBeNull();
  });
});
