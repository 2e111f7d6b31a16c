/**
 * █ [CORE] :: DB_SCHEMA
 * =====================================================================
 * DESC:   Partido -> 2 innings -> log de bolas (append-only, soft delete).
 *         Los contadores de innings son caché; el log manda.
 * STATUS: STABLE
 * =====================================================================
 */
import {
  pgTable,
  uuid,
  text,
  integer,
  timestamp,
  pgEnum,
  boolean,
  index,
  unique,
  varchar,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";
import {
  DISMISSAL_TYPES,
  EXTRA_TYPES,
  INNINGS_STATUSES,
  MATCH_STATUSES,
  TOSS_DECISIONS,
} from "../types/cricket.ts";

// =============================================================================
// █ ENUMS
// =============================================================================
export const matchStatusEnum = pgEnum("match_status", MATCH_STATUSES);
export const inningsStatusEnum = pgEnum("innings_status", INNINGS_STATUSES);
export const extraTypeEnum = pgEnum("extra_type", EXTRA_TYPES);
export const dismissalTypeEnum = pgEnum("dismissal_type", DISMISSAL_TYPES);
export const tossDecisionEnum = pgEnum("toss_decision", TOSS_DECISIONS);

// =============================================================================
// █ TABLAS
// =============================================================================

// 1. MATCHES
export const matches = pgTable(
  "matches",
  {
    id: uuid("id").primaryKey(),
    teamAName: varchar("team_a_name", { length: 100 }).notNull(),
    teamBName: varchar("team_b_name", { length: 100 }).notNull(),
    totalOvers: integer("total_overs").notNull(),
    venue: varchar("venue", { length: 200 }),

    tossWinner: varchar("toss_winner", { length: 100 }),
    tossDecision: tossDecisionEnum("toss_decision"),

    status: matchStatusEnum("status").default("toss").notNull(),
    resultSummary: text("result_summary"),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    createdAtIdx: index("matches_created_at_idx").on(table.createdAt),
  }),
);

// 2. INNINGS (Agregado cacheado)
export const innings = pgTable(
  "innings",
  {
    id: uuid("id").primaryKey(),
    matchId: uuid("match_id")
      .references(() => matches.id, { onDelete: "cascade" })
      .notNull(),
    inningsNumber: integer("innings_number").notNull(),
    battingTeam: varchar("batting_team", { length: 100 }).notNull(),
    bowlingTeam: varchar("bowling_team", { length: 100 }).notNull(),

    totalRuns: integer("total_runs").default(0).notNull(),
    totalWickets: integer("total_wickets").default(0).notNull(),
    currentOver: integer("current_over").default(0).notNull(),
    currentBall: integer("current_ball").default(0).notNull(),

    extrasWides: integer("extras_wides").default(0).notNull(),
    extrasNoBalls: integer("extras_no_balls").default(0).notNull(),
    extrasByes: integer("extras_byes").default(0).notNull(),
    extrasLegByes: integer("extras_leg_byes").default(0).notNull(),
    extrasPenalties: integer("extras_penalties").default(0).notNull(),

    target: integer("target"),
    status: inningsStatusEnum("status").default("not_started").notNull(),

    strikerName: varchar("striker_name", { length: 100 }).notNull(),
    nonStrikerName: varchar("non_striker_name", { length: 100 }).notNull(),
    currentBowlerName: varchar("current_bowler_name", { length: 100 }).notNull(),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    innings_match_number_unique: unique("innings_match_number_unique").on(
      table.matchId,
      table.inningsNumber,
    ),
  }),
);

// 3. BALL EVENTS (Event log; solo `is_undone` cambia tras insertar)
export const ballEvents = pgTable(
  "ball_events",
  {
    id: uuid("id").primaryKey(),
    inningsId: uuid("innings_id")
      .references(() => innings.id, { onDelete: "cascade" })
      .notNull(),
    sequenceNumber: integer("sequence_number").notNull(),
    logIndex: integer("log_index").notNull(),
    overNumber: integer("over_number").notNull(),
    ballNumber: integer("ball_number").notNull(),

    bowlerName: varchar("bowler_name", { length: 100 }).notNull(),
    batsmanName: varchar("batsman_name", { length: 100 }).notNull(),
    nonStrikerName: varchar("non_striker_name", { length: 100 }).notNull(),

    runsScored: integer("runs_scored").default(0).notNull(),
    isBoundaryFour: boolean("is_boundary_four").default(false).notNull(),
    isBoundarySix: boolean("is_boundary_six").default(false).notNull(),
    extraType: extraTypeEnum("extra_type").default("none").notNull(),
    extraRuns: integer("extra_runs").default(0).notNull(),

    isWicket: boolean("is_wicket").default(false).notNull(),
    dismissalType: dismissalTypeEnum("dismissal_type"),
    dismissedBatsman: varchar("dismissed_batsman", { length: 100 }),
    fielderName: varchar("fielder_name", { length: 100 }),

    isLegalDelivery: boolean("is_legal_delivery").default(true).notNull(),
    isUndone: boolean("is_undone").default(false).notNull(),

    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    ball_events_innings_log_unique: unique("ball_events_innings_log_unique").on(
      table.inningsId,
      table.logIndex,
    ),
    inningsIdx: index("ball_events_innings_idx").on(table.inningsId),
  }),
);

// =============================================================================
// █ RELATIONS
// =============================================================================
export const matchesRelations = relations(matches, ({ many }) => ({
  innings: many(innings),
}));

export const inningsRelations = relations(innings, ({ one, many }) => ({
  match: one(matches, {
    fields: [innings.matchId],
    references: [matches.id],
  }),
  balls: many(ballEvents),
}));

export const ballEventsRelations = relations(ballEvents, ({ one }) => ({
  innings: one(innings, {
    fields: [ballEvents.inningsId],
    references: [innings.id],
  }),
}));
