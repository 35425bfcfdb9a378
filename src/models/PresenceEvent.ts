import mongoose, { Schema, Document } from 'mongoose';
import { AttendanceStatus, ATTENDANCE_STATUSES, VerificationMethod, VERIFICATION_METHODS } from '../services/presence';

/**
 * One verification attempt. Written once, never updated or deleted.
 */
export interface IPresenceEvent extends Document {
  identity: string;
  latitude: number;
  longitude: number;
  accuracy?: number;
  status: AttendanceStatus;
  method: VerificationMethod;
  geofenceId: string | null;
  timeWindowId: string | null;
  timestamp: Date;
  recordedAt: Date;
}

const PresenceEventSchema: Schema = new Schema({
  identity: {
    type: String,
    required: true,
    index: true,
  },
  latitude: {
    type: Number,
    required: true,
    min: -90,
    max: 90,
  },
  longitude: {
    type: Number,
    required: true,
    min: -180,
    max: 180,
  },
  accuracy: {
    type: Number,
    required: false,
    min: 0,
  },
  status: {
    type: String,
    enum: ATTENDANCE_STATUSES,
    required: true,
  },
  method: {
    type: String,
    enum: VERIFICATION_METHODS,
    required: true,
  },
  geofenceId: {
    type: String,
    default: null,
  },
  timeWindowId: {
    type: String,
    default: null,
  },
  timestamp: {
    type: Date,
    required: true,
  },
}, {
  timestamps: { createdAt: 'recordedAt', updatedAt: false },
});

// A retried submission for the same identity and instant maps to the same event
PresenceEventSchema.index({ identity: 1, timestamp: 1 }, { unique: true });
PresenceEventSchema.index({ timestamp: -1 });

PresenceEventSchema.pre('save', function (next) {
  if (!this.isNew) {
    next(new Error('Presence events are immutable'));
    return;
  }
  next();
});

PresenceEventSchema.pre(
  ['updateOne', 'updateMany', 'findOneAndUpdate', 'replaceOne', 'findOneAndReplace', 'deleteOne', 'deleteMany', 'findOneAndDelete'],
  function (next) {
    next(new Error('Presence events are immutable'));
  }
);

export const PresenceEvent = mongoose.model<IPresenceEvent>('PresenceEvent', PresenceEventSchema);
