export { ServiceClient, InvalidResponseError, decodeJsonObject, unwrapData } from "./base.js";
export type { JsonObject, ServiceResult } from "./base.js";
export { UserServiceClient } from "./user.js";
export { PaymentServiceClient, type CapturePaymentInput } from "./payment.js";
export { CalendarServiceClient } from "./calendar.js";
export { EmailServiceClient } from "./email.js";
export { SocialServiceClient } from "./social.js";
