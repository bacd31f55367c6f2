import type { AlertMetadata } from './alert-metadata.js';

export type SourceType =
  | 'OVERSPEEDING'
  | 'COMPLIANCE'
  | 'FEEDBACK_NEGATIVE'
  | 'FEEDBACK_POSITIVE'
  | 'DOCUMENT_EXPIRY'
  | 'SAFETY';

export const SOURCE_TYPES = [
  'OVERSPEEDING',
  'COMPLIANCE',
  'FEEDBACK_NEGATIVE',
  'FEEDBACK_POSITIVE',
  'DOCUMENT_EXPIRY',
  'SAFETY',
] as const satisfies readonly SourceType[];

export type AlertSeverity = 'INFO' | 'WARNING' | 'CRITICAL';

export const ALERT_SEVERITIES = ['INFO', 'WARNING', 'CRITICAL'] as const satisfies readonly AlertSeverity[];

export type AlertStatus = 'OPEN' | 'ESCALATED' | 'AUTO_CLOSED' | 'RESOLVED';

export const ALERT_STATUSES = ['OPEN', 'ESCALATED', 'AUTO_CLOSED', 'RESOLVED'] as const satisfies readonly AlertStatus[];

/** Prefix used in alert ids, e.g. `OSP-2026-00001`. */
export const SOURCE_PREFIX: Readonly<Record<SourceType, string>> = {
  OVERSPEEDING: 'OSP',
  COMPLIANCE: 'CMP',
  FEEDBACK_NEGATIVE: 'FBN',
  FEEDBACK_POSITIVE: 'FBP',
  DOCUMENT_EXPIRY: 'DOC',
  SAFETY: 'SAF',
};

export const DEFAULT_SEVERITY: Readonly<Record<SourceType, AlertSeverity>> = {
  OVERSPEEDING: 'WARNING',
  COMPLIANCE: 'INFO',
  FEEDBACK_NEGATIVE: 'WARNING',
  FEEDBACK_POSITIVE: 'INFO',
  DOCUMENT_EXPIRY: 'WARNING',
  SAFETY: 'CRITICAL',
};

export function formatAlertId(sourceType: SourceType, year: number, sequence: number): string {
  return `${SOURCE_PREFIX[sourceType]}-${year}-${String(sequence).padStart(5, '0')}`;
}

/** One entry of an alert's append-only history. `fromStatus` is null only for the creation entry. */
export interface StateTransition {
  readonly fromStatus: AlertStatus | null;
  readonly toStatus: AlertStatus;
  readonly ts: Date;
  readonly reason: string;
  readonly triggeredBy: string;
  readonly ruleTriggered?: string;
}

export interface Alert {
  readonly id: string;
  readonly sourceType: SourceType;
  readonly severity: AlertSeverity;
  readonly status: AlertStatus;
  readonly entityKey: string;
  readonly metadata: AlertMetadata;
  readonly timestamp: Date;
  readonly stateHistory: readonly StateTransition[];
  readonly escalatedAt?: Date;
  readonly closedAt?: Date;
  readonly autoCloseReason?: string;
  readonly resolvedAt?: Date;
  readonly resolvedBy?: string;
  readonly resolutionNotes?: string;
  readonly updatedAt: Date;
}

export interface NewAlert {
  sourceType: SourceType;
  entityKey: string;
  severity?: AlertSeverity;
  metadata: AlertMetadata;
  timestamp: Date;
}
