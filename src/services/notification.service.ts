/**
 * Notification Service
 *
 * Outbound delivery over hospital APIs, webhooks and the SMS/voice/email/push
 * gateways, plus a small in-process queue for fire-and-forget notices that
 * must not hold up the request that triggered them.
 */

import axios, { type AxiosInstance } from "axios";
import { logger } from "../shared/logger";
import { errorMessage } from "../shared/errors";

// ============ Types ============

export type DeliveryChannel = "api" | "sms" | "webhook" | "voice" | "push" | "email";

export interface NotificationRequest {
  channel: DeliveryChannel;
  /** Base URL for api, URL for webhook, phone for sms/voice, address or user id otherwise */
  recipient: string;
  /** Human-readable text for sms, voice, email and push */
  message: string;
  /** Structured packet for api and webhook */
  data?: Record<string, unknown>;
  apiKey?: string | null;
}

export interface DeliveryResult {
  success: boolean;
  error?: string;
  responseCode?: number;
}

export interface NotificationSender {
  send(request: NotificationRequest): Promise<DeliveryResult>;
}

export interface GatewayUrls {
  sms?: string;
  voice?: string;
  email?: string;
  push?: string;
}

// ============ HTTP Sender ============

export class HttpNotificationSender implements NotificationSender {
  private readonly http: AxiosInstance;

  constructor(
    private readonly gateways: GatewayUrls,
    timeoutMs = 10_000,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ timeout: timeoutMs });
  }

  async send(request: NotificationRequest): Promise<DeliveryResult> {
    try {
      switch (request.channel) {
        case "api":
          return await this.post(
            `${request.recipient.replace(/\/+$/, "")}/emergency/alerts`,
            request.data ?? {},
            request.apiKey ? { Authorization: `Bearer ${request.apiKey}` } : {}
          );
        case "webhook":
          return await this.post(request.recipient, request.data ?? {});
        case "sms":
        case "voice":
        case "email":
        case "push": {
          const gateway = this.gateways[request.channel];
          if (!gateway) {
            return {
              success: false,
              error: `${request.channel} gateway not configured`,
            };
          }
          return await this.post(gateway, {
            to: request.recipient,
            message: request.message,
            data: request.data,
          });
        }
      }
    } catch (error) {
      if (axios.isAxiosError(error)) {
        return {
          success: false,
          error: error.message,
          responseCode: error.response?.status,
        };
      }
      return { success: false, error: errorMessage(error) };
    }
  }

  private async post(
    url: string,
    body: Record<string, unknown>,
    headers: Record<string, string> = {}
  ): Promise<DeliveryResult> {
    const response = await this.http.post(url, body, {
      headers: { "Content-Type": "application/json", ...headers },
      validateStatus: () => true,
    });

    if (response.status >= 200 && response.status < 300) {
      return { success: true, responseCode: response.status };
    }
    return {
      success: false,
      error: `HTTP ${response.status}`,
      responseCode: response.status,
    };
  }
}

// ============ Dispatcher ============

export interface DispatchCallbacks {
  onSuccess?: (result: DeliveryResult) => void;
  onFailure?: (reason: string) => void;
}

/**
 * Runs notifications after the current request returns.
 * drain() resolves once every queued notification has settled.
 */
export class NotificationDispatcher {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly log = logger.child({ module: "notifications" });

  constructor(private readonly sender: NotificationSender) {}

  enqueue(request: NotificationRequest, callbacks: DispatchCallbacks = {}): void {
    const task: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.deliver(request, callbacks))
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private async deliver(
    request: NotificationRequest,
    callbacks: DispatchCallbacks
  ): Promise<void> {
    let reason: string;
    try {
      const result = await this.sender.send(request);
      if (result.success) {
        callbacks.onSuccess?.(result);
        return;
      }
      reason = result.error ?? "delivery failed";
    } catch (error) {
      reason = errorMessage(error);
    }

    this.log.warn(
      { channel: request.channel, recipient: request.recipient, reason },
      "Notification not delivered"
    );
    callbacks.onFailure?.(reason);
  }
}
