/**
 * Test doubles shared by the unit tests.
 */
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseConfig } from "../../src/config/loader.js";
import type { ConfigOverrides, SuiteConfig } from "../../src/config/types.js";
import { ScriptFailure } from "../../src/errors.js";
import type { ScriptExecutor, ScriptInvocation } from "../../src/exec/script-runner.js";
import {
  type AdminApi,
  type CreateRoomRequest,
  MatrixApiError,
  type Membership,
  type RegistrationRequest,
  type RoomSummary,
  type Session,
} from "../../src/matrix/homeserver-client.js";

/** Fresh scratch directory under the OS temp dir. */
export function tempRoot(): string {
  return mkdtempSync(join(tmpdir(), "mx-testbed-test-"));
}

/** Scratch worker resources: the entry point and one template. */
export function workerResources(): string {
  const dir = tempRoot();
  writeFileSync(join(dir, "workers_start.py"), "#!/usr/bin/env python\n");
  mkdirSync(join(dir, "conf"));
  writeFileSync(join(dir, "conf", "shared.yaml.j2"), "{{ shared_worker_config }}\n");
  return dir;
}

/** Parse a YAML suite with its root redirected to a scratch directory. */
export function makeConfig(yaml: string, overrides: ConfigOverrides = {}): SuiteConfig {
  return parseConfig(yaml, { root: tempRoot(), ...overrides });
}

// ---------------------------------------------------------------------------
// Script executor
// ---------------------------------------------------------------------------

/**
 * Records invocations instead of spawning a shell. A line listed in
 * `failing` makes its list fail with exit code 1 at that index.
 */
export class RecordingExecutor implements ScriptExecutor {
  readonly invocations: ScriptInvocation[] = [];
  readonly failing = new Set<string>();

  async run(invocation: ScriptInvocation): Promise<void> {
    this.invocations.push(invocation);
    for (const [index, line] of invocation.lines.entries()) {
      if (this.failing.has(line)) {
        throw new ScriptFailure({
          phase: invocation.phase,
          stage: invocation.stage,
          index,
          command: line,
          exitCode: 1,
          module: invocation.module,
        });
      }
    }
  }

  /** Stages that actually had lines to run, in order. */
  stagesRun(): string[] {
    return this.invocations.filter((i) => i.lines.length > 0).map((i) => i.stage);
  }
}

// ---------------------------------------------------------------------------
// Homeserver
// ---------------------------------------------------------------------------

interface FakeUser {
  password: string;
  admin: boolean;
}

export interface FakeRoom {
  creator: string;
  name?: string;
  topic?: string;
  public: boolean;
  members: Map<string, Membership>;
}

/** In-process stand-in for the server's client-server and admin APIs. */
export class FakeHomeserver implements AdminApi {
  readonly users = new Map<string, FakeUser>();
  readonly rooms = new Map<string, FakeRoom>();
  readonly aliases = new Map<string, string>();
  readonly unlimited = new Set<string>();
  /** Number of calls per operation. */
  readonly calls = new Map<string, number>();
  /** `isAlive` answers false this many times before answering true. */
  unavailableChecks = 0;

  private readonly tokens = new Map<string, string>();
  private nextId = 1;

  constructor(readonly serverName = "localhost:9999") {}

  count(operation: string): number {
    return this.calls.get(operation) ?? 0;
  }

  async isAlive(): Promise<boolean> {
    this.track("isAlive");
    if (this.unavailableChecks > 0) {
      this.unavailableChecks--;
      return false;
    }
    return true;
  }

  async register(request: RegistrationRequest): Promise<Session> {
    this.track("register");
    const userId = this.userId(request.localname);
    if (this.users.has(userId)) {
      throw new MatrixApiError(400, "M_USER_IN_USE", "User ID already taken.");
    }
    this.users.set(userId, { password: request.password, admin: request.admin });
    return this.issue(userId);
  }

  async login(localname: string, password: string): Promise<Session> {
    this.track("login");
    const userId = this.userId(localname);
    const user = this.users.get(userId);
    if (!user || user.password !== password) {
      throw new MatrixApiError(403, "M_FORBIDDEN", "Invalid username or password");
    }
    return this.issue(userId);
  }

  async userExists(admin: Session, userId: string): Promise<boolean> {
    this.track("userExists");
    this.requireAdmin(admin);
    return this.users.has(userId);
  }

  async overrideRateLimit(admin: Session, userId: string): Promise<void> {
    this.track("overrideRateLimit");
    this.requireAdmin(admin);
    if (!this.users.has(userId)) throw new MatrixApiError(404, "M_NOT_FOUND", "User not found");
    this.unlimited.add(userId);
  }

  async resolveAlias(alias: string): Promise<string | null> {
    this.track("resolveAlias");
    return this.aliases.get(alias) ?? null;
  }

  async deleteAlias(session: Session, alias: string): Promise<void> {
    this.track("deleteAlias");
    this.requireAdmin(session);
    if (!this.aliases.delete(alias)) throw new MatrixApiError(404, "M_NOT_FOUND", "Room alias not found");
  }

  async roomSummary(session: Session, roomId: string): Promise<RoomSummary | null> {
    this.track("roomSummary");
    const caller = this.whoami(session);
    const room = this.rooms.get(roomId);
    if (!room || room.members.get(caller) !== "join") return null;
    return { name: room.name, topic: room.topic, creator: room.creator, public: room.public };
  }

  async createRoom(session: Session, request: CreateRoomRequest): Promise<string> {
    this.track("createRoom");
    const creator = this.whoami(session);
    const alias = request.aliasLocalpart === undefined ? undefined : `#${request.aliasLocalpart}:${this.serverName}`;
    if (alias !== undefined && this.aliases.has(alias)) {
      throw new MatrixApiError(400, "M_ROOM_IN_USE", "Room alias already taken");
    }
    const roomId = `!room${this.nextId++}:${this.serverName}`;
    this.rooms.set(roomId, {
      creator,
      name: request.name,
      topic: request.topic,
      public: request.public,
      members: new Map<string, Membership>([[creator, "join"]]),
    });
    if (alias !== undefined) this.aliases.set(alias, roomId);
    return roomId;
  }

  async membership(session: Session, roomId: string, userId: string): Promise<Membership | null> {
    this.track("membership");
    this.whoami(session);
    return this.room(roomId).members.get(userId) ?? null;
  }

  async invite(session: Session, roomId: string, userId: string): Promise<void> {
    this.track("invite");
    const inviter = this.whoami(session);
    const room = this.room(roomId);
    if (room.members.get(inviter) !== "join") throw new MatrixApiError(403, "M_FORBIDDEN", "Not in room");
    if (room.members.get(userId) === "join") throw new MatrixApiError(403, "M_FORBIDDEN", "Already in room");
    room.members.set(userId, "invite");
  }

  async join(session: Session, roomId: string): Promise<void> {
    this.track("join");
    const userId = this.whoami(session);
    const room = this.room(roomId);
    if (!room.public && room.members.get(userId) !== "invite" && room.members.get(userId) !== "join") {
      throw new MatrixApiError(403, "M_FORBIDDEN", "You are not invited to this room.");
    }
    room.members.set(userId, "join");
  }

  // ------- helpers -------

  userId(localname: string): string {
    return `@${localname}:${this.serverName}`;
  }

  /** Rooms currently reachable through an alias. */
  aliasedRoom(localpart: string): FakeRoom | undefined {
    const roomId = this.aliases.get(`#${localpart}:${this.serverName}`);
    return roomId === undefined ? undefined : this.rooms.get(roomId);
  }

  private room(roomId: string): FakeRoom {
    const room = this.rooms.get(roomId);
    if (!room) throw new MatrixApiError(404, "M_NOT_FOUND", `Unknown room ${roomId}`);
    return room;
  }

  private issue(userId: string): Session {
    const accessToken = `token-${this.nextId++}`;
    this.tokens.set(accessToken, userId);
    return { userId, accessToken };
  }

  private whoami(session: Session): string {
    const userId = this.tokens.get(session.accessToken);
    if (userId === undefined) throw new MatrixApiError(401, "M_UNKNOWN_TOKEN", "Invalid access token");
    return userId;
  }

  private requireAdmin(session: Session): void {
    const userId = this.whoami(session);
    if (!this.users.get(userId)?.admin) throw new MatrixApiError(403, "M_FORBIDDEN", "You are not a server admin");
  }

  private track(operation: string): void {
    this.calls.set(operation, this.count(operation) + 1);
  }
}
