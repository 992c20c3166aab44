// src/services/social.ts
import type { RemoteClient } from "../client.js";
import type { JsonValue } from "../types.js";
import { ServiceClient, type JsonObject, type ServiceResult } from "./base.js";

export class SocialServiceClient extends ServiceClient {
  constructor(remote: RemoteClient, dependency = "social-service") {
    super(remote, dependency);
  }

  exchangeToken(provider: string, code: string, redirectUri: string): Promise<ServiceResult<JsonObject>> {
    return this.request({
      method: "POST",
      path: "oauth/exchange",
      body: { provider, code, redirect_uri: redirectUri },
    });
  }

  publishEvent(payload: { [key: string]: JsonValue }): Promise<ServiceResult<JsonObject>> {
    return this.request({ method: "POST", path: "shares/event", body: payload });
  }
}
