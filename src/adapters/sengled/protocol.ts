// Endpoints and fixed login fields of the Sengled cloud, as used by the
// Sengled Home mobile app. None of these are user-configurable.

export const AUTH_URL = "https://ucenter.cloud.sengled.com/user/app/customer/v2/AuthenCross.json";
export const DEVICE_LIST_URL = "https://life2.cloud.sengled.com/life2/device/list.json";
export const MQTT_URL = "wss://us-mqtt.cloud.sengled.com:443/mqtt";

export const LOGIN_OS_TYPE = "ios";
export const LOGIN_UUID = "xxx";
export const LOGIN_PRODUCT_CODE = "life";
export const LOGIN_APP_CODE = "life";

/** Client identity the MQTT gateway expects alongside the session cookie. */
export const CLIENT_IDENTITY_HEADER = "X-Requested-With";
export const CLIENT_IDENTITY = "com.sengled.life2";

export const MQTT_CLIENT_ID_SUFFIX = "@lifeApp";

export function sessionCookie(token: string): string {
  return `JSESSIONID=${token}`;
}
