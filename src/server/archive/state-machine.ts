/**
 * Archive State Machine
 *
 * The state of an archive is the `to_state` of its most recent transition row.
 * Transitions are append-only: writing one flips the previous row's
 * `most_recent` flag and inserts the new row with the next sort key, inside a
 * single transaction that holds a row lock on the archive. This is the only
 * place archives are mutated after creation.
 *
 *   pending ──► processing ──► success
 *      │            ├────────► failed
 *      ├────────────┴────────► blocked
 *      └─────────────────────► invalid_url
 */

import { and, asc, desc, eq } from "drizzle-orm";

import { generateUuidv7 } from "@/lib/uuidv7";
import type { Database } from "../db";
import {
  contentArchives,
  contentArchiveTransitions,
  type ArchiveState,
  type ContentArchiveTransition,
  type NewContentArchive,
  type TransitionMetadata,
} from "../db/schema";
import { ArchiveNotFoundError, ConcurrentTransitionError, InvalidTransitionError } from "./errors";

export const INITIAL_STATE: ArchiveState = "pending";

const TERMINAL_STATES: ReadonlySet<ArchiveState> = new Set([
  "success",
  "failed",
  "blocked",
  "invalid_url",
]);

const TRANSITIONS: Readonly<Record<ArchiveState, ReadonlySet<ArchiveState>>> = {
  pending: new Set<ArchiveState>(["processing", "blocked", "invalid_url"]),
  processing: new Set<ArchiveState>(["success", "failed", "blocked"]),
  success: new Set<ArchiveState>(),
  failed: new Set<ArchiveState>(),
  blocked: new Set<ArchiveState>(),
  invalid_url: new Set<ArchiveState>(),
};

/**
 * Archive columns the transition operation may update alongside the state.
 */
export type ArchiveUpdate = Partial<
  Pick<
    NewContentArchive,
    | "title"
    | "description"
    | "contentText"
    | "contentHtml"
    | "rawHtml"
    | "imageUrl"
    | "metadata"
    | "errorMessage"
    | "fetchedAt"
  >
>;

export function allowedTransitions(state: ArchiveState): ReadonlySet<ArchiveState> {
  return TRANSITIONS[state];
}

export function canTransition(from: ArchiveState, to: ArchiveState): boolean {
  return TRANSITIONS[from].has(to);
}

export function isTerminalState(state: ArchiveState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Postgres reports unique index violations with SQLSTATE 23505. Drivers
 * attach the code to the error itself or to its cause.
 */
function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && error.code === "23505") return true;
  return "cause" in error && isUniqueViolation(error.cause);
}

/**
 * Writes the initial `pending` transition for a freshly inserted archive.
 * Must run in the same transaction as the archive insert.
 */
export async function recordInitialState(
  db: Database,
  archiveId: string
): Promise<ContentArchiveTransition> {
  const [row] = await db
    .insert(contentArchiveTransitions)
    .values({
      id: generateUuidv7(),
      contentArchiveId: archiveId,
      toState: INITIAL_STATE,
      metadata: {},
      sortKey: 1,
      mostRecent: true,
    })
    .returning();
  return row;
}

/**
 * Moves an archive to `targetState`.
 *
 * @param metadata recorded on the new transition row
 * @param archiveUpdate archive columns written in the same transaction
 * @returns the inserted transition
 * @throws InvalidTransitionError if the move is not allowed from the current state; nothing is written
 * @throws ConcurrentTransitionError if a conflicting transition was committed concurrently
 * @throws ArchiveNotFoundError if the archive does not exist
 */
export async function transitionTo(
  db: Database,
  archiveId: string,
  targetState: ArchiveState,
  metadata: TransitionMetadata = {},
  archiveUpdate?: ArchiveUpdate
): Promise<ContentArchiveTransition> {
  try {
    return await db.transaction(async (tx) => {
      // Serializes transitions of this archive
      const [archive] = await tx
        .select({ id: contentArchives.id })
        .from(contentArchives)
        .where(eq(contentArchives.id, archiveId))
        .for("update");

      if (!archive) {
        throw new ArchiveNotFoundError(archiveId);
      }

      const [last] = await tx
        .select()
        .from(contentArchiveTransitions)
        .where(eq(contentArchiveTransitions.contentArchiveId, archiveId))
        .orderBy(desc(contentArchiveTransitions.sortKey))
        .limit(1);

      const current = await tx
        .select()
        .from(contentArchiveTransitions)
        .where(
          and(
            eq(contentArchiveTransitions.contentArchiveId, archiveId),
            eq(contentArchiveTransitions.mostRecent, true)
          )
        )
        .limit(1);

      const fromState = current[0]?.toState ?? INITIAL_STATE;
      if (!canTransition(fromState, targetState)) {
        throw new InvalidTransitionError(archiveId, fromState, targetState);
      }

      if (current[0]) {
        await tx
          .update(contentArchiveTransitions)
          .set({ mostRecent: false })
          .where(eq(contentArchiveTransitions.id, current[0].id));
      }

      const [inserted] = await tx
        .insert(contentArchiveTransitions)
        .values({
          id: generateUuidv7(),
          contentArchiveId: archiveId,
          toState: targetState,
          metadata,
          sortKey: (last?.sortKey ?? 0) + 1,
          mostRecent: true,
        })
        .returning();

      await tx
        .update(contentArchives)
        .set({ ...archiveUpdate, updatedAt: new Date() })
        .where(eq(contentArchives.id, archiveId));

      return inserted;
    });
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConcurrentTransitionError(archiveId, { cause: error });
    }
    throw error;
  }
}

/**
 * Current state of an archive, read from its most recent transition only.
 *
 * @throws ArchiveNotFoundError if the archive does not exist
 */
export async function getCurrentState(db: Database, archiveId: string): Promise<ArchiveState> {
  const [row] = await db
    .select({ toState: contentArchiveTransitions.toState })
    .from(contentArchiveTransitions)
    .where(
      and(
        eq(contentArchiveTransitions.contentArchiveId, archiveId),
        eq(contentArchiveTransitions.mostRecent, true)
      )
    )
    .limit(1);

  if (row) {
    return row.toState;
  }

  const [archive] = await db
    .select({ id: contentArchives.id })
    .from(contentArchives)
    .where(eq(contentArchives.id, archiveId))
    .limit(1);
  if (!archive) {
    throw new ArchiveNotFoundError(archiveId);
  }
  return INITIAL_STATE;
}

/**
 * All transitions of an archive, oldest first.
 */
export async function getTransitionHistory(
  db: Database,
  archiveId: string
): Promise<ContentArchiveTransition[]> {
  return db
    .select()
    .from(contentArchiveTransitions)
    .where(eq(contentArchiveTransitions.contentArchiveId, archiveId))
    .orderBy(asc(contentArchiveTransitions.sortKey));
}

/**
 * Deletes one transition row (administrative correction). When the deleted
 * row was the most recent, the highest remaining sort key takes the flag.
 *
 * @returns false if no such transition exists
 */
export async function deleteTransition(db: Database, transitionId: string): Promise<boolean> {
  return db.transaction(async (tx) => {
    const [row] = await tx
      .select()
      .from(contentArchiveTransitions)
      .where(eq(contentArchiveTransitions.id, transitionId))
      .limit(1);

    if (!row) {
      return false;
    }

    await tx
      .select({ id: contentArchives.id })
      .from(contentArchives)
      .where(eq(contentArchives.id, row.contentArchiveId))
      .for("update");

    await tx
      .delete(contentArchiveTransitions)
      .where(eq(contentArchiveTransitions.id, transitionId));

    if (row.mostRecent) {
      const [previous] = await tx
        .select({ id: contentArchiveTransitions.id })
        .from(contentArchiveTransitions)
        .where(eq(contentArchiveTransitions.contentArchiveId, row.contentArchiveId))
        .orderBy(desc(contentArchiveTransitions.sortKey))
        .limit(1);

      if (previous) {
        await tx
          .update(contentArchiveTransitions)
          .set({ mostRecent: true })
          .where(eq(contentArchiveTransitions.id, previous.id));
      }
    }

    return true;
  });
}

/**
 * Drives a non-terminal archive to `failed`, passing through `processing`
 * when it is still `pending` (there is no direct pending → failed edge).
 * error_message from the metadata is copied onto the archive.
 *
 * @returns the `failed` transition, or null if the archive was already terminal
 */
export async function failArchive(
  db: Database,
  archiveId: string,
  metadata: TransitionMetadata,
  archiveUpdate?: ArchiveUpdate
): Promise<ContentArchiveTransition | null> {
  return db.transaction(async (tx) => {
    const state = await getCurrentState(tx, archiveId);
    if (isTerminalState(state)) {
      return null;
    }

    if (state === "pending") {
      await transitionTo(tx, archiveId, "processing");
    }

    return transitionTo(tx, archiveId, "failed", metadata, {
      errorMessage: metadata.error_message ?? null,
      ...archiveUpdate,
    });
  });
}
