/**
 * HomeserverClient: the slice of the Matrix client-server and Synapse
 * admin APIs that fixture provisioning needs.
 *
 * Responses are validated with zod; non-2xx answers become MatrixApiError
 * carrying the Matrix `errcode`.
 */

import { createHmac } from "node:crypto";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { isTimeout, sleep } from "./retry.js";

export interface Session {
  userId: string;
  accessToken: string;
}

export interface RegistrationRequest {
  localname: string;
  password: string;
  admin: boolean;
}

export type Membership = "join" | "invite" | "leave" | "ban" | "knock";

export interface RoomSummary {
  name?: string;
  topic?: string;
  creator?: string;
  public: boolean;
}

export interface CreateRoomRequest {
  public: boolean;
  name?: string;
  topic?: string;
  /** Alias local part; the server appends its own name. */
  aliasLocalpart?: string;
}

/** Operations the provisioner performs against a live server. */
export interface AdminApi {
  isAlive(signal?: AbortSignal): Promise<boolean>;
  register(request: RegistrationRequest): Promise<Session>;
  login(localname: string, password: string): Promise<Session>;
  userExists(admin: Session, userId: string): Promise<boolean>;
  overrideRateLimit(admin: Session, userId: string): Promise<void>;
  resolveAlias(alias: string): Promise<string | null>;
  deleteAlias(session: Session, alias: string): Promise<void>;
  /** Null when the room is not visible to `session`. */
  roomSummary(session: Session, roomId: string): Promise<RoomSummary | null>;
  createRoom(session: Session, request: CreateRoomRequest): Promise<string>;
  membership(session: Session, roomId: string, userId: string): Promise<Membership | null>;
  invite(session: Session, roomId: string, userId: string): Promise<void>;
  join(session: Session, roomId: string): Promise<void>;
}

export class MatrixApiError extends Error {
  readonly status: number;
  readonly errcode: string;

  constructor(status: number, errcode: string, message: string) {
    super(`${errcode} (HTTP ${status}): ${message}`);
    this.name = "MatrixApiError";
    this.status = status;
    this.errcode = errcode;
  }
}

const errorBodySchema = z.object({ errcode: z.string().default("M_UNKNOWN"), error: z.string().default("") });
const nonceSchema = z.object({ nonce: z.string() });
const sessionSchema = z.object({ user_id: z.string(), access_token: z.string() });
const roomIdSchema = z.object({ room_id: z.string() });
const membershipSchema = z.object({ membership: z.enum(["join", "invite", "leave", "ban", "knock"]) });
const stateEventSchema = z.object({
  type: z.string(),
  sender: z.string().optional(),
  state_key: z.string().optional(),
  content: z.record(z.unknown()),
});
const stateSchema = z.array(stateEventSchema);

/** Compute the MAC expected by the shared-secret registration endpoint. */
export function registrationMac(secret: string, nonce: string, request: RegistrationRequest): string {
  return createHmac("sha1", secret)
    .update(`${nonce}\0${request.localname}\0${request.password}\0${request.admin ? "admin" : "notadmin"}`)
    .digest("hex");
}

export interface HomeserverClientOptions {
  baseUrl: string;
  registrationSharedSecret: string;
  /** Attempts for requests that fail before reaching the server. */
  maxAttempts?: number;
  /** Base delay of the quadratic backoff between those attempts. */
  retryDelayMs?: number;
  /** Budget of one request, retries and response body included. A timed-out request is not retried. */
  requestTimeoutMs?: number;
}

interface RequestOptions {
  session?: Session;
  body?: unknown;
}

export class HomeserverClient implements AdminApi {
  private readonly baseUrl: string;
  private readonly secret: string;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly requestTimeoutMs: number;

  constructor(options: HomeserverClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.secret = options.registrationSharedSecret;
    this.maxAttempts = options.maxAttempts ?? 10;
    this.retryDelayMs = options.retryDelayMs ?? 300;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
  }

  async isAlive(signal?: AbortSignal): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/health`, { signal });
      return res.ok;
    } catch {
      return false;
    }
  }

  async register(request: RegistrationRequest): Promise<Session> {
    const path = "/_synapse/admin/v1/register";
    const { nonce } = nonceSchema.parse(await this.request("GET", path));
    const body = await this.request("POST", path, {
      body: {
        nonce,
        username: request.localname,
        displayname: request.localname,
        password: request.password,
        admin: request.admin,
        mac: registrationMac(this.secret, nonce, request),
      },
    });
    return toSession(body);
  }

  async login(localname: string, password: string): Promise<Session> {
    const body = await this.request("POST", "/_matrix/client/v3/login", {
      body: {
        type: "m.login.password",
        identifier: { type: "m.id.user", user: localname },
        password,
      },
    });
    return toSession(body);
  }

  async userExists(admin: Session, userId: string): Promise<boolean> {
    try {
      await this.request("GET", `/_synapse/admin/v2/users/${encodeURIComponent(userId)}`, { session: admin });
      return true;
    } catch (err) {
      if (err instanceof MatrixApiError && err.status === 404) return false;
      throw err;
    }
  }

  async overrideRateLimit(admin: Session, userId: string): Promise<void> {
    await this.request("POST", `/_synapse/admin/v1/users/${encodeURIComponent(userId)}/override_ratelimit`, {
      session: admin,
      body: { messages_per_second: 0, burst_count: 0 },
    });
  }

  async resolveAlias(alias: string): Promise<string | null> {
    try {
      const body = await this.request("GET", `/_matrix/client/v3/directory/room/${encodeURIComponent(alias)}`);
      return roomIdSchema.parse(body).room_id;
    } catch (err) {
      if (err instanceof MatrixApiError && err.status === 404) return null;
      throw err;
    }
  }

  async deleteAlias(session: Session, alias: string): Promise<void> {
    await this.request("DELETE", `/_matrix/client/v3/directory/room/${encodeURIComponent(alias)}`, { session });
  }

  async roomSummary(session: Session, roomId: string): Promise<RoomSummary | null> {
    let body: unknown;
    try {
      body = await this.request("GET", `/_matrix/client/v3/rooms/${encodeURIComponent(roomId)}/state`, { session });
    } catch (err) {
      if (err instanceof MatrixApiError && (err.status === 403 || err.status === 404)) return null;
      throw err;
    }

    const summary: RoomSummary = { public: false };
    for (const event of stateSchema.parse(body)) {
      if (event.state_key !== undefined && event.state_key !== "") continue;
      const { content } = event;
      switch (event.type) {
        case "m.room.name":
          if (typeof content.name === "string") summary.name = content.name;
          break;
        case "m.room.topic":
          if (typeof content.topic === "string") summary.topic = content.topic;
          break;
        case "m.room.create":
          summary.creator = typeof content.creator === "string" ? content.creator : event.sender;
          break;
        case "m.room.join_rules":
          summary.public = content.join_rule === "public";
          break;
      }
    }
    return summary;
  }

  async createRoom(session: Session, request: CreateRoomRequest): Promise<string> {
    const body: Record<string, unknown> = {
      visibility: request.public ? "public" : "private",
      preset: request.public ? "public_chat" : "private_chat",
    };
    if (request.name !== undefined) body.name = request.name;
    if (request.topic !== undefined) body.topic = request.topic;
    if (request.aliasLocalpart !== undefined) body.room_alias_name = request.aliasLocalpart;

    const response = await this.request("POST", "/_matrix/client/v3/createRoom", { session, body });
    return roomIdSchema.parse(response).room_id;
  }

  async membership(session: Session, roomId: string, userId: string): Promise<Membership | null> {
    const path = `/_matrix/client/v3/rooms/${encodeURIComponent(roomId)}/state/m.room.member/${encodeURIComponent(userId)}`;
    try {
      return membershipSchema.parse(await this.request("GET", path, { session })).membership;
    } catch (err) {
      if (err instanceof MatrixApiError && err.status === 404) return null;
      throw err;
    }
  }

  async invite(session: Session, roomId: string, userId: string): Promise<void> {
    await this.request("POST", `/_matrix/client/v3/rooms/${encodeURIComponent(roomId)}/invite`, {
      session,
      body: { user_id: userId },
    });
  }

  async join(session: Session, roomId: string): Promise<void> {
    await this.request("POST", `/_matrix/client/v3/join/${encodeURIComponent(roomId)}`, { session, body: {} });
  }

  // ------- transport -------

  private async request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const headers: Record<string, string> = {};
    if (options.body !== undefined) headers["Content-Type"] = "application/json";
    if (options.session) headers.Authorization = `Bearer ${options.session.accessToken}`;

    logger.debug(`[provision] ${method} ${path}`);
    const url = `${this.baseUrl}${path}`;
    let res: Response;
    let text: string;
    try {
      res = await this.fetchWithRetry(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
      });
      text = await res.text();
    } catch (err) {
      if (isTimeout(err)) {
        throw new Error(`${method} ${url} timed out after ${this.requestTimeoutMs}ms`, { cause: err });
      }
      throw err;
    }
    const body: unknown = text.length > 0 ? safeJson(text) : {};
    if (!res.ok) {
      const parsed = errorBodySchema.safeParse(body);
      const { errcode, error } = parsed.success ? parsed.data : { errcode: "M_UNKNOWN", error: text };
      throw new MatrixApiError(res.status, errcode, error || res.statusText);
    }
    return body;
  }

  /** Retries only failures that never reached the server (connection refused, reset). */
  private async fetchWithRetry(url: string, init: RequestInit): Promise<Response> {
    const signal = AbortSignal.timeout(this.requestTimeoutMs);
    for (let attempt = 1; ; attempt++) {
      try {
        return await fetch(url, { ...init, signal });
      } catch (err) {
        if (isTimeout(err) || attempt >= this.maxAttempts) throw err;
        const delay = attempt * attempt * this.retryDelayMs * (1 + Math.random() * 2);
        logger.debug(
          `[provision] ${init.method} ${url} failed (${errorMessage(err)}), retrying in ${Math.round(delay)}ms`,
        );
        await sleep(delay);
      }
    }
  }
}

function toSession(body: unknown): Session {
  const { user_id, access_token } = sessionSchema.parse(body);
  return { userId: user_id, accessToken: access_token };
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
