/**
 * FixtureProvisioner: converges declared users and rooms against a live
 * homeserver.
 *
 * Safe to run repeatedly against a server that already holds some of the
 * fixtures: users are registered only when absent, rooms are reused when
 * their alias still points at a matching room, memberships are only ever
 * added.
 */

import { PROVISIONER_ADMIN } from "../config/schema.js";
import type { RoomDeclaration, SuiteConfig, UserDeclaration } from "../config/types.js";
import { ProvisioningError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { AdminApi, RoomSummary, Session } from "../matrix/homeserver-client.js";

export { PROVISIONER_ADMIN };

export interface ProvisionedRoom {
  roomId: string;
  creator: string;
  alias?: string;
  /** False when an existing room was reused. */
  created: boolean;
}

export interface ProvisioningReport {
  /** Local name to fully qualified user id. */
  users: Map<string, string>;
  registered: string[];
  rooms: ProvisionedRoom[];
}

export class FixtureProvisioner {
  private readonly sessions = new Map<string, Session>();
  private adminSession: Session | undefined;

  constructor(
    private readonly api: AdminApi,
    private readonly config: SuiteConfig,
  ) {}

  async provision(): Promise<ProvisioningReport> {
    const report: ProvisioningReport = { users: new Map(), registered: [], rooms: [] };

    for (const user of this.config.users) {
      await this.withFixture("user", user.localname, () => this.ensureUser(user, report));
    }

    for (const user of this.config.users) {
      for (const [index, room] of user.rooms.entries()) {
        const label = room.alias ? `#${room.alias}` : `${user.localname}/rooms[${index}]`;
        await this.withFixture("room", label, async () => {
          report.rooms.push(await this.ensureRoom(user, room));
        });
      }
    }

    logger.info(
      `[provision] ${report.users.size} user(s) (${report.registered.length} registered), ${report.rooms.length} room(s)`,
    );
    return report;
  }

  // ------- users -------

  private async ensureUser(user: UserDeclaration, report: ProvisioningReport): Promise<void> {
    const admin = await this.admin();
    const userId = this.userId(user.localname);

    let session: Session;
    if (await this.api.userExists(admin, userId)) {
      logger.debug(`[provision] User ${userId} already exists`);
      session = await this.api.login(user.localname, user.password);
    } else {
      logger.info(`[provision] Registering ${userId}${user.admin ? " (admin)" : ""}`);
      session = await this.api.register({ localname: user.localname, password: user.password, admin: user.admin });
      report.registered.push(user.localname);
    }
    this.sessions.set(user.localname, session);
    report.users.set(user.localname, session.userId);

    if (user.rateLimit === "unlimited") {
      await this.api.overrideRateLimit(admin, session.userId);
    }
  }

  /** Log in as, or register, the provisioner's own admin account. */
  private async admin(): Promise<Session> {
    if (this.adminSession) return this.adminSession;
    const password = this.config.homeserver.registrationSharedSecret;
    let session: Session;
    try {
      session = await this.api.login(PROVISIONER_ADMIN, password);
    } catch (loginError) {
      logger.debug(`[provision] Login as ${PROVISIONER_ADMIN} failed (${errorMessage(loginError)}), registering`);
      try {
        session = await this.api.register({ localname: PROVISIONER_ADMIN, password, admin: true });
      } catch (err) {
        throw new Error(
          `${PROVISIONER_ADMIN}: login failed (${errorMessage(loginError)}), registration failed (${errorMessage(err)})`,
          { cause: err },
        );
      }
    }
    this.adminSession = session;
    return session;
  }

  // ------- rooms -------

  private async ensureRoom(creator: UserDeclaration, room: RoomDeclaration): Promise<ProvisionedRoom> {
    const session = this.session(creator.localname);
    const alias = room.alias === undefined ? undefined : `#${room.alias}:${this.config.homeserver.serverName}`;

    let roomId: string | undefined;
    let created = false;
    if (alias !== undefined) {
      const existing = await this.api.resolveAlias(alias);
      if (existing !== null) {
        const summary = await this.api.roomSummary(session, existing);
        if (summary !== null && matches(summary, room, session.userId)) {
          logger.debug(`[provision] Reusing ${existing} for ${alias}`);
          roomId = existing;
        } else {
          logger.info(`[provision] Alias ${alias} points to stale room ${existing}, removing it`);
          await this.api.deleteAlias(await this.admin(), alias);
        }
      }
    }

    if (roomId === undefined) {
      roomId = await this.api.createRoom(session, {
        public: room.public,
        name: room.name,
        topic: room.topic,
        aliasLocalpart: room.alias,
      });
      created = true;
      logger.info(`[provision] Created room ${roomId}${alias ? ` at ${alias}` : ""}`);
    }

    for (const member of room.members) {
      if (member === creator.localname) continue;
      await this.ensureMember(session, roomId, member);
    }

    return { roomId, creator: creator.localname, alias, created };
  }

  private async ensureMember(creator: Session, roomId: string, localname: string): Promise<void> {
    const member = this.session(localname);
    const current = await this.api.membership(creator, roomId, member.userId);
    if (current === "join") return;
    if (current !== "invite") {
      await this.api.invite(creator, roomId, member.userId);
    }
    await this.api.join(member, roomId);
    logger.debug(`[provision] ${member.userId} joined ${roomId}`);
  }

  // ------- helpers -------

  private session(localname: string): Session {
    const session = this.sessions.get(localname);
    if (!session) {
      throw new Error(`No session for user "${localname}"`);
    }
    return session;
  }

  private userId(localname: string): string {
    return `@${localname}:${this.config.homeserver.serverName}`;
  }

  private async withFixture(kind: "user" | "room", name: string, step: () => Promise<void>): Promise<void> {
    try {
      await step();
    } catch (err) {
      throw new ProvisioningError(kind, name, err);
    }
  }
}

/** A room left by an earlier `up` is reused only if it still looks like the declaration. */
function matches(summary: RoomSummary, room: RoomDeclaration, creatorId: string): boolean {
  return (
    summary.creator === creatorId &&
    summary.name === room.name &&
    summary.topic === room.topic &&
    summary.public === room.public
  );
}
