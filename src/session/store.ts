/**
 * Session Store
 *
 * Persists sessions as versioned JSON records keyed by session id. The file
 * store writes one file per session under `.helmsman/sessions/`; the memory
 * store keeps deep copies in process.
 */

import { existsSync } from "node:fs";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { CONFIG_DIR_NAME } from "../config/core-config.js";
import { CoreError, sessionNotFound } from "../protocol/errors.js";
import type { SessionId, SessionRecord, SessionSummary } from "../protocol/types.js";
import { createLogger } from "../utils/logger.js";
import { ulid } from "../utils/ulid.js";
import { SessionRecordSchema } from "./schema.js";
import { Session } from "./session.js";

const logger = createLogger("session:store");

export const SESSIONS_DIR_NAME = "sessions";
const NAME_LENGTH = 50;
const SUMMARY_LENGTH = 100;
const SUMMARY_PART_LENGTH = 40;

export interface SessionStore {
  save(session: Session, name?: string): Promise<SessionId>;
  load(id: SessionId): Promise<Session>;
  list(limit?: number): Promise<SessionSummary[]>;
  delete(id: SessionId): Promise<boolean>;
  latest(): Promise<Session | null>;
}

// ===========================================================================
// Naming & summaries
// ===========================================================================

function userMessages(record: SessionRecord): string[] {
  return record.turns
    .filter((t) => t.role === "user" && t.content.trim().length > 0)
    .map((t) => t.content);
}

/**
 * Default session name from the first user message.
 */
export function defaultSessionName(record: SessionRecord): string {
  const first = userMessages(record)[0];
  if (first === undefined) return `Session ${record.id}`;
  const name = first.slice(0, NAME_LENGTH).trim();
  return first.length > NAME_LENGTH ? `${name}...` : name;
}

/**
 * First and last user message, shortened.
 */
export function summarize(record: SessionRecord): string {
  const messages = userMessages(record);
  const first = messages[0];
  const last = messages[messages.length - 1];
  if (first === undefined || last === undefined) return "";

  const summary =
    messages.length === 1
      ? first
      : `${first.slice(0, SUMMARY_PART_LENGTH)}... -> ${last.slice(0, SUMMARY_PART_LENGTH)}`;
  return summary.length > SUMMARY_LENGTH ? `${summary.slice(0, SUMMARY_LENGTH - 3)}...` : summary;
}

function toSummary(record: SessionRecord): SessionSummary {
  return {
    id: record.id,
    name: record.name ?? defaultSessionName(record),
    updatedAt: record.updatedAt,
    turnCount: record.turns.length,
    summary: summarize(record),
  };
}

function newestFirst(a: SessionRecord, b: SessionRecord): number {
  if (a.updatedAt !== b.updatedAt) return a.updatedAt < b.updatedAt ? 1 : -1;
  // ULIDs sort by creation time
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

/**
 * Prepare a session for persisting: apply an explicit name or derive one,
 * and keep the original creation time when overwriting.
 */
function prepareRecord(session: Session, name: string | undefined, previous: SessionRecord | null): SessionRecord {
  if (name !== undefined) {
    session.name = name;
  }
  const record = session.toRecord();
  if (record.name === undefined) {
    record.name = defaultSessionName(record);
    session.name = record.name;
  }
  if (previous) {
    record.createdAt = previous.createdAt;
  }
  return record;
}

export function parseSessionRecord(raw: unknown, source: string): SessionRecord {
  const parsed = SessionRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CoreError("invalid_arguments", `Invalid session record in ${source}`, {
      details: { source, issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

// ===========================================================================
// File store
// ===========================================================================

export class FileSessionStore implements SessionStore {
  readonly dir: string;

  constructor(workspaceRoot: string) {
    this.dir = join(workspaceRoot, CONFIG_DIR_NAME, SESSIONS_DIR_NAME);
  }

  private pathFor(id: SessionId): string {
    if (!/^[\w-]+$/.test(id)) {
      throw new CoreError("invalid_arguments", `Invalid session id: ${id}`, { details: { id } });
    }
    return join(this.dir, `${id}.json`);
  }

  private async readRecord(id: SessionId): Promise<SessionRecord | null> {
    const path = this.pathFor(id);
    if (!existsSync(path)) return null;
    const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
    return parseSessionRecord(raw, path);
  }

  async save(session: Session, name?: string): Promise<SessionId> {
    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(session.id);
    const record = prepareRecord(session, name, await this.readRecord(session.id));

    // Write-then-rename so a crash never leaves a half-written record
    const tmpPath = `${path}.${ulid()}.tmp`;
    await writeFile(tmpPath, JSON.stringify(record, null, 2) + "\n", "utf-8");
    await rename(tmpPath, path);

    logger.info({ sessionId: record.id, turns: record.turns.length }, "Session saved");
    return record.id;
  }

  async load(id: SessionId): Promise<Session> {
    const record = await this.readRecord(id);
    if (!record) throw sessionNotFound(id);
    logger.debug({ sessionId: id }, "Session loaded");
    return Session.fromRecord(record);
  }

  private async readAll(): Promise<SessionRecord[]> {
    if (!existsSync(this.dir)) return [];
    const files = (await readdir(this.dir)).filter((f) => f.endsWith(".json"));
    const records: SessionRecord[] = [];
    for (const file of files) {
      const path = join(this.dir, file);
      try {
        records.push(parseSessionRecord(JSON.parse(await readFile(path, "utf-8")), path));
      } catch (error) {
        logger.warn({ path, error: String(error) }, "Skipping unreadable session file");
      }
    }
    return records.sort(newestFirst);
  }

  async list(limit: number = 20): Promise<SessionSummary[]> {
    return (await this.readAll()).slice(0, limit).map(toSummary);
  }

  async delete(id: SessionId): Promise<boolean> {
    const path = this.pathFor(id);
    if (!existsSync(path)) return false;
    await rm(path);
    logger.info({ sessionId: id }, "Session deleted");
    return true;
  }

  async latest(): Promise<Session | null> {
    const [record] = await this.readAll();
    return record ? Session.fromRecord(record) : null;
  }
}

// ===========================================================================
// Memory store
// ===========================================================================

export class MemorySessionStore implements SessionStore {
  private records = new Map<SessionId, SessionRecord>();

  async save(session: Session, name?: string): Promise<SessionId> {
    const record = prepareRecord(session, name, this.records.get(session.id) ?? null);
    this.records.set(record.id, structuredClone(record));
    return record.id;
  }

  async load(id: SessionId): Promise<Session> {
    const record = this.records.get(id);
    if (!record) throw sessionNotFound(id);
    return Session.fromRecord(record);
  }

  async list(limit: number = 20): Promise<SessionSummary[]> {
    return [...this.records.values()].sort(newestFirst).slice(0, limit).map(toSummary);
  }

  async delete(id: SessionId): Promise<boolean> {
    return this.records.delete(id);
  }

  async latest(): Promise<Session | null> {
    const [record] = [...this.records.values()].sort(newestFirst);
    return record ? Session.fromRecord(record) : null;
  }
}
