// backend/services/location/src/repo/mongo/models/eventLog.model.ts
/**
 * Append-only ledger of every country/state/city mutation. Rows are inserted
 * in the same transaction as the entity change and never updated here;
 * processingStatus/processedAt are reserved for a relay that does not exist yet.
 */
import { Schema, Types, type Connection, type Model } from "mongoose";
import {
  ENTITY_TYPES,
  EVENT_LOG_LIMITS,
  EVENT_TYPES,
  PROCESSING_STATUSES,
  type EntityType,
  type EventType,
  type ProcessingStatus,
} from "../../../../../shared/contracts/location.contract";

export interface EventLogDoc {
  _id: Types.ObjectId;
  eventType: EventType;
  entityType: EntityType;
  entityId: string;
  requestMethod: string;
  requestPath: string;
  requestBody: string | null;
  userId: string | null;
  ipAddress: string | null;
  createdAt: Date;
  statusCode: number | null;
  processingStatus: ProcessingStatus;
  processedAt: Date | null;
}

export const EventLogSchema = new Schema<EventLogDoc>(
  {
    eventType: { type: String, enum: EVENT_TYPES, required: true },
    entityType: { type: String, enum: ENTITY_TYPES, required: true },
    entityId: { type: String, required: true },
    requestMethod: { type: String, required: true, maxlength: EVENT_LOG_LIMITS.requestMethod },
    requestPath: { type: String, required: true, maxlength: EVENT_LOG_LIMITS.requestPath },
    requestBody: { type: String, default: null },
    userId: { type: String, default: null, maxlength: EVENT_LOG_LIMITS.userId },
    ipAddress: { type: String, default: null, maxlength: EVENT_LOG_LIMITS.ipAddress },
    createdAt: { type: Date, required: true, default: () => new Date() },
    statusCode: { type: Number, default: null },
    processingStatus: {
      type: String,
      enum: PROCESSING_STATUSES,
      required: true,
      default: "completed",
    },
    processedAt: { type: Date, default: null },
  },
  {
    collection: "event_logs",
    strict: true,
    versionKey: false,
    bufferCommands: false,
  }
);

EventLogSchema.index({ entityType: 1, entityId: 1, _id: 1 }, { name: "ix_entity" });
EventLogSchema.index({ createdAt: -1 }, { name: "ix_createdAt_desc" });

export type EventLogModel = Model<EventLogDoc>;

export function eventLogModel(conn: Connection): EventLogModel {
  return conn.model<EventLogDoc>("EventLog", EventLogSchema);
}
