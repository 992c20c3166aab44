// src/services/payment.ts
import type { RemoteClient } from "../client.js";
import type { JsonValue } from "../types.js";
import { ServiceClient, type JsonObject, type ServiceResult } from "./base.js";

export interface CapturePaymentInput {
  eventId: number;
  attendeeEmail: string;
  amount: number;
  currency: string;
  metadata?: { [key: string]: JsonValue };
}

export class PaymentServiceClient extends ServiceClient {
  constructor(remote: RemoteClient, dependency = "payment-service") {
    super(remote, dependency);
  }

  capturePayment(input: CapturePaymentInput): Promise<ServiceResult<JsonObject>> {
    return this.request({
      method: "POST",
      path: "payments/capture",
      body: {
        event_id: input.eventId,
        attendee_email: input.attendeeEmail,
        amount: input.amount,
        currency: input.currency,
        metadata: input.metadata ?? {},
      },
    });
  }

  /** Refund body is only sent when a reason is given. */
  refundPayment(paymentId: string, reason?: string): Promise<ServiceResult<JsonObject>> {
    return this.request({
      method: "POST",
      path: `payments/${encodeURIComponent(paymentId)}/refund`,
      body: reason ? { reason } : undefined,
    });
  }

  getPaymentStatus(paymentId: string): Promise<ServiceResult<JsonObject>> {
    return this.request({ method: "GET", path: `payments/${encodeURIComponent(paymentId)}` });
  }
}
