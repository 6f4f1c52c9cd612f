import { pgTable, uuid, text, timestamp, jsonb, boolean, doublePrecision } from 'drizzle-orm/pg-core';
import type { AuditEntry, ClaimEvidence, ClaimInsertion } from '@shared/types';

export const claims = pgTable('claims', {
  id: uuid('id').primaryKey(),
  claimantName: text('claimant_name').notNull(),
  amount: doublePrecision('amount').notNull(),
  description: text('description').notNull(),
  evidence: jsonb('evidence').$type<ClaimEvidence>().notNull().default({}),
  requiresInvestigation: boolean('requires_investigation').notNull().default(false),
  humanOverride: boolean('human_override').notNull().default(false),
  currentState: text('current_state').notNull().default('SUBMITTED'),
  stateHistory: jsonb('state_history').$type<string[]>().notNull(),
  insertion: jsonb('insertion').$type<ClaimInsertion>(),
  auditLog: jsonb('audit_log').$type<AuditEntry[]>().notNull().default([]),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export type ClaimRow = typeof claims.$inferSelect;
