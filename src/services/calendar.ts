// src/services/calendar.ts
import type { RemoteClient } from "../client.js";
import type { JsonValue } from "../types.js";
import { ServiceClient, type JsonObject, type ServiceResult } from "./base.js";

export class CalendarServiceClient extends ServiceClient {
  constructor(remote: RemoteClient, dependency = "calendar-service") {
    super(remote, dependency);
  }

  syncEvent(payload: { [key: string]: JsonValue }): Promise<ServiceResult<JsonObject>> {
    return this.request({ method: "POST", path: "calendars/sync", body: payload });
  }

  removeEvent(externalId: string): Promise<ServiceResult<JsonObject>> {
    return this.request({ method: "DELETE", path: `calendars/${encodeURIComponent(externalId)}` });
  }
}
