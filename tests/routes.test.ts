import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildApp } from "../src/app";
import { seedHospitals } from "../src/shared/seed";
import { createTestContext, type TestContext } from "./helpers";

const FIRST_AIDER = { "x-user-id": "fa-1", "x-user-role": "first_aider" };
const OTHER_FIRST_AIDER = { "x-user-id": "fa-2", "x-user-role": "first_aider" };
const ADMIN = { "x-user-id": "admin-1", "x-user-role": "system_admin" };

const staffAt = (hospitalId: string) => ({
  "x-user-id": `staff-${hospitalId}`,
  "x-user-role": "hospital_staff",
  "x-hospital-id": hospitalId,
});

const alertBody = {
  emergencyType: "trauma",
  priority: "high",
  location: { lat: -1.2864, lng: 36.8172 },
  description: "Motorbike collision, rider conscious",
  reporterPhone: "+254711000000",
};

describe("HTTP API", () => {
  let ctx: TestContext;
  let app: FastifyInstance;

  beforeEach(async () => {
    ctx = await createTestContext();
    await seedHospitals(ctx.store);
    app = await buildApp(ctx.services, { docs: false });
  });

  afterEach(async () => {
    await app.close();
  });

  it("reports health", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok" });
  });

  describe("hospitals", () => {
    it("lists nearby hospitals nearest first", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/hospitals/nearby?lat=-1.2864&lng=36.8172&radiusKm=5",
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.success).toBe(true);
      expect(body.count).toBe(3);
      expect(body.data.map((h: { id: string }) => h.id)).toEqual([
        "nairobi-hospital",
        "knh",
        "gertrudes",
      ]);
      expect(body.data[0].distanceKm).toBe(1.83);
    });

    it("rejects an unknown specialty filter", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/hospitals/nearby?lat=-1.2864&lng=36.8172&specialties=dentistry",
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ success: false, error: "Invalid input" });
    });

    it("ranks hospitals for an emergency", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/hospitals/match",
        payload: { lat: -1.2864, lng: 36.8172, emergencyType: "trauma", maxResults: 2 },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.count).toBe(2);
      expect(body.data[0].hospital.id).toBe("knh");
      expect(body.data[1].score.totalScore).toBe(82.5);
    });

    it("rejects an unknown emergency type", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/hospitals/match",
        payload: { lat: -1.2864, lng: 36.8172, emergencyType: "flood" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ success: false, error: "Invalid input" });
    });

    it("returns a hospital without its api key", async () => {
      const res = await app.inject({ method: "GET", url: "/hospitals/knh" });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.data.id).toBe("knh");
      expect(body.data).not.toHaveProperty("apiKey");
    });

    it("answers 404 for an unknown hospital", async () => {
      const res = await app.inject({ method: "GET", url: "/hospitals/nope" });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ success: false, error: "Hospital nope not found" });
    });

    it("takes capacity reports from the hospital's own staff only", async () => {
      const denied = await app.inject({
        method: "PATCH",
        url: "/hospitals/knh/capacity",
        headers: staffAt("gertrudes"),
        payload: { emergencyBedsAvailable: 5 },
      });
      expect(denied.statusCode).toBe(403);
      expect(denied.json()).toEqual({
        success: false,
        error: "Only this hospital's staff can report its capacity",
      });

      const res = await app.inject({
        method: "PATCH",
        url: "/hospitals/knh/capacity",
        headers: staffAt("knh"),
        payload: { emergencyBedsAvailable: 5 },
      });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.message).toBe("Capacity updated");
      expect(body.data.capacity.emergencyBedsAvailable).toBe(5);
    });
  });

  describe("alerts", () => {
    it("needs a caller identity", async () => {
      const res = await app.inject({ method: "POST", url: "/alerts", payload: alertBody });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        success: false,
        error: "Caller identity is missing or invalid",
      });
    });

    it("creates an alert and returns it again for a repeat report", async () => {
      const created = await app.inject({
        method: "POST",
        url: "/alerts",
        headers: FIRST_AIDER,
        payload: alertBody,
      });
      expect(created.statusCode).toBe(201);
      const first = created.json();
      expect(first.message).toBe("Alert created");
      expect(first.data.status).toBe("pending");

      const repeat = await app.inject({
        method: "POST",
        url: "/alerts",
        headers: FIRST_AIDER,
        payload: alertBody,
      });
      expect(repeat.statusCode).toBe(200);
      expect(repeat.json().message).toBe("Existing alert returned");
      expect(repeat.json().data.id).toBe(first.data.id);
    });

    it("keeps other first aiders out of an alert", async () => {
      const created = await app.inject({
        method: "POST",
        url: "/alerts",
        headers: FIRST_AIDER,
        payload: alertBody,
      });
      const id: string = created.json().data.id;

      const res = await app.inject({
        method: "POST",
        url: `/alerts/${id}/process`,
        headers: OTHER_FIRST_AIDER,
      });
      expect(res.statusCode).toBe(403);
      expect(res.json().error).toBe("Only the reporter or an administrator can do this");
    });

    it("dispatches an alert to the nearest hospital", async () => {
      const created = await app.inject({
        method: "POST",
        url: "/alerts",
        headers: FIRST_AIDER,
        payload: alertBody,
      });
      const id: string = created.json().data.id;

      const res = await app.inject({
        method: "POST",
        url: `/alerts/${id}/process`,
        headers: FIRST_AIDER,
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.data.selection).toBe("haversine");
      expect(body.data.hospital.id).toBe("nairobi-hospital");
      expect(body.data.alert.status).toBe("hospital_selected");
      expect(body.data.communication.status).toBe("sent");
    });
  });

  describe("communications", () => {
    async function openCommunication(): Promise<string> {
      const alert = await app.inject({
        method: "POST",
        url: "/alerts",
        headers: FIRST_AIDER,
        payload: alertBody,
      });
      const res = await app.inject({
        method: "POST",
        url: "/communications",
        headers: FIRST_AIDER,
        payload: {
          alertId: alert.json().data.id,
          hospitalId: "nairobi-hospital",
          chiefComplaint: "Open fracture, left leg",
        },
      });
      expect(res.statusCode).toBe(201);
      expect(res.json().message).toBe("Hospital notified via sms");
      return res.json().data.communication.id;
    }

    it("walks the handshake from delivery to acknowledgement", async () => {
      const id = await openCommunication();

      const ack = await app.inject({
        method: "POST",
        url: `/communications/${id}/acknowledge`,
        headers: staffAt("nairobi-hospital"),
        payload: {},
      });
      expect(ack.statusCode).toBe(200);
      expect(ack.json().message).toBe("Emergency alert acknowledged");
      expect(ack.json().data.status).toBe("acknowledged");

      const pending = await app.inject({
        method: "GET",
        url: "/communications/hospital/pending",
        headers: staffAt("nairobi-hospital"),
      });
      expect(pending.json().count).toBe(1);
      expect(pending.json().data[0].status).toBe("acknowledged");
    });

    it("rejects field updates outside the caller's side", async () => {
      const id = await openCommunication();
      await app.inject({
        method: "POST",
        url: `/communications/${id}/acknowledge`,
        headers: staffAt("nairobi-hospital"),
        payload: {},
      });

      const res = await app.inject({
        method: "PATCH",
        url: `/communications/${id}/fields`,
        headers: staffAt("nairobi-hospital"),
        payload: { doctorsReady: true, firstAidProvided: "Splint applied" },
      });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.error).toBe("Fields not writable by hospital_staff");
      expect(body.details.rejected).toEqual(["firstAidProvided"]);
    });

    it("keeps the maintenance endpoints for administrators", async () => {
      const denied = await app.inject({
        method: "POST",
        url: "/communications/retry",
        headers: FIRST_AIDER,
      });
      expect(denied.statusCode).toBe(403);

      const res = await app.inject({
        method: "POST",
        url: "/communications/retry",
        headers: ADMIN,
      });
      expect(res.statusCode).toBe(200);
      expect(res.json().data).toEqual({
        scanned: 0,
        retried: 0,
        succeeded: 0,
        failed: 0,
        skipped: 0,
      });
    });
  });
});
