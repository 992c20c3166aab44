// src/services/email.ts
import type { RemoteClient } from "../client.js";
import type { JsonValue } from "../types.js";
import { ServiceClient, type JsonObject, type ServiceResult } from "./base.js";

export class EmailServiceClient extends ServiceClient {
  constructor(remote: RemoteClient, dependency = "email-service") {
    super(remote, dependency);
  }

  sendNotification(payload: { [key: string]: JsonValue }): Promise<ServiceResult<JsonObject>> {
    return this.request({ method: "POST", path: "notifications/send", body: payload });
  }
}
