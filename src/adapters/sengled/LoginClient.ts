import { z } from "zod";
import { AuthenticationError } from "../../domain/errors";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { ConsoleLogger } from "../sys/ConsoleLogger";
import { defaultFetch, postJson, type FetchLike } from "./http";
import {
  AUTH_URL,
  LOGIN_APP_CODE,
  LOGIN_OS_TYPE,
  LOGIN_PRODUCT_CODE,
  LOGIN_UUID,
} from "./protocol";

export interface Credentials {
  username: string;
  password: string;
}

export interface LoginRequestBody {
  user: string;
  pwd: string;
  osType: typeof LOGIN_OS_TYPE;
  uuid: typeof LOGIN_UUID;
  productCode: typeof LOGIN_PRODUCT_CODE;
  appCode: typeof LOGIN_APP_CODE;
}

export interface LoginClientOptions {
  fetch?: FetchLike;
  logger?: LoggerPort;
}

const loginSuccessSchema = z.object({
  // Stricter than the service: an empty token is treated as a rejected login.
  jsessionId: z.string().min(1),
});

export function buildLoginRequest(credentials: Credentials): LoginRequestBody {
  return {
    user: credentials.username,
    pwd: credentials.password,
    osType: LOGIN_OS_TYPE,
    uuid: LOGIN_UUID,
    productCode: LOGIN_PRODUCT_CODE,
    appCode: LOGIN_APP_CODE,
  };
}

/**
 * The login endpoint has no status field: a body carrying `jsessionId` is a
 * success and every other JSON value is a rejection. Returns the token, or
 * null for the rejection case; never throws on an unexpected shape.
 */
export function parseLoginResponse(body: unknown): string | null {
  const parsed = loginSuccessSchema.safeParse(body);
  return parsed.success ? parsed.data.jsessionId : null;
}

export class LoginClient {
  private readonly fetchImpl: FetchLike;
  private readonly log: LoggerPort;

  constructor(options: LoginClientOptions = {}) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.log = options.logger ?? new ConsoleLogger({ scope: "sengled-login" });
  }

  async login(credentials: Credentials): Promise<string> {
    this.log.debug("Logging into Sengled cloud", { user: credentials.username });

    const body = await postJson(this.fetchImpl, AUTH_URL, "Sengled login", {
      body: buildLoginRequest(credentials),
    });

    const token = parseLoginResponse(body);
    if (token === null) {
      this.log.warn("Sengled login rejected", { user: credentials.username });
      throw new AuthenticationError();
    }

    this.log.info("Sengled login successful", { user: credentials.username });
    return token;
  }
}
