// src/services/user.ts
import type { RemoteClient } from "../client.js";
import type { JsonValue } from "../types.js";
import { ServiceClient, type JsonObject, type ServiceResult } from "./base.js";

export class UserServiceClient extends ServiceClient {
  constructor(remote: RemoteClient, dependency = "user-service") {
    super(remote, dependency);
  }

  getUserProfile(userId: string): Promise<ServiceResult<JsonObject>> {
    return this.requestData({ method: "GET", path: `users/${encodeURIComponent(userId)}` });
  }

  updatePreferences(userId: string, preferences: { [key: string]: JsonValue }): Promise<ServiceResult<JsonObject>> {
    return this.requestData({
      method: "PUT",
      path: `users/${encodeURIComponent(userId)}/preferences`,
      body: preferences,
    });
  }

  search(query: string, limit = 25): Promise<ServiceResult<JsonObject>> {
    return this.request({ method: "GET", path: "users/search", query: { q: query, limit } });
  }
}
