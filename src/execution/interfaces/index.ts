/**
 * Execution Interfaces Export
 */

export type { AuditEventType, AuditRecord, AuditSink } from './audit-sink.interface.js';
export type { NotificationKind, NotificationSink } from './notification-sink.interface.js';
export type { OrderTranslator } from './order-translator.interface.js';
export type { PositionTracker, TrackedPosition } from './position-tracker.interface.js';
